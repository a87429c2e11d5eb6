import {
    CancelledError,
    PollConfig,
    SmsActivateClient,
    SmsActivateProvider,
    SmsActivateService,
    StaticDialCodeDirectory,
    VerificationService,
    loadConfigFromDotenv,
} from '../src';

/**
 * Stop waiting on Ctrl+C or after 30 seconds, whichever comes first.
 */
async function main() {
    const config = loadConfigFromDotenv();

    const provider = new SmsActivateProvider(new SmsActivateClient(config.apiKey, config.apiUrl));
    const service = new VerificationService(provider, StaticDialCodeDirectory.bundled(), PollConfig.patient());

    const acquisition = await service.acquireNumber('UA', SmsActivateService.INSTAGRAM);
    console.log(`📱 ${acquisition.fullNumber.withPlusPrefix()} (task ${acquisition.taskId.value})`);

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), 30000);
    process.once('SIGINT', () => controller.abort());

    console.log('⏳ Waiting for the code (Ctrl+C to cancel)...');
    try {
        const code = await service.waitForCodeCancellable(acquisition.taskId, controller.signal);
        console.log(`✅ Code: ${code.value}`);
        await service.finish(acquisition.taskId);
    } catch (error: unknown) {
        if (error instanceof CancelledError) {
            console.log(`🛑 Cancelled after ${(error.elapsedMs / 1000).toFixed(1)}s (${error.pollCount} polls); number released`);
            return;
        }
        throw error;
    } finally {
        clearTimeout(timer);
    }
}

main().catch(console.error);
