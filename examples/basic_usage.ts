import {
    RetryableProvider,
    ServiceError,
    SmsActivateClient,
    SmsActivateProvider,
    SmsActivateService,
    StaticDialCodeDirectory,
    VerificationService,
    loadConfigFromDotenv,
} from '../src';

/**
 * Rent a number, wait for the code, mark it used.
 */
async function main() {
    const config = loadConfigFromDotenv();

    const client = new SmsActivateClient(config.apiKey, config.apiUrl);
    const provider = new RetryableProvider(
        new SmsActivateProvider(client, { blacklist: config.blacklist }),
        { policy: config.retryPolicy }
    );
    const service = new VerificationService(provider, StaticDialCodeDirectory.bundled(), config.pollConfig);

    console.log('📱 Requesting a number...');
    const acquisition = await service.acquireNumber('UA', SmsActivateService.WHATSAPP);
    console.log(`   Number: ${acquisition.fullNumber.withPlusPrefix()} (national ${acquisition.nationalNumber.value})`);
    console.log(`   Task:   ${acquisition.taskId.value}`);

    console.log('\n⏳ Waiting for the code...');
    try {
        const code = await service.waitForCode(acquisition.taskId);
        console.log(`   ✅ Code: ${code.value}`);
        await service.finish(acquisition.taskId);
    } catch (error: unknown) {
        if (error instanceof ServiceError) {
            console.error(`   ❌ ${error.kind}: ${error.message}`);
            console.error(`   Retry with a new number? ${error.shouldRetryOperation() ? 'yes' : 'no'}`);
            return;
        }
        throw error;
    }
}

main().catch(console.error);
