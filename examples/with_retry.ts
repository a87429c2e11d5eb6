import {
    RetryableProvider,
    SmsActivateClient,
    SmsActivateProvider,
    StaticDialCodeDirectory,
    VerificationService,
    createRetryPolicy,
    describeError,
    loadConfigFromDotenv,
    runVerificationWorkflow,
} from '../src';

/**
 * Call-level retries with an observer, plus operation-level retries through the workflow.
 */
async function main() {
    const config = loadConfigFromDotenv();

    const provider = new RetryableProvider(
        new SmsActivateProvider(new SmsActivateClient(config.apiKey, config.apiUrl)),
        {
            policy: createRetryPolicy({ minDelayMs: 500, maxDelayMs: 10000, maxAttempts: 5 }),
            onRetry: (error, delayMs, context) => {
                console.log(`🔁 ${context.operation} attempt ${context.attempt} failed (${describeError(error)}); next in ${delayMs}ms`);
            },
        }
    );
    const service = new VerificationService(provider, StaticDialCodeDirectory.bundled(), config.pollConfig);

    const result = await runVerificationWorkflow(
        { service: 'ig', countries: ['GB', 'UA', 'KZ'], maxOperationAttempts: 3 },
        { service }
    );

    switch (result.status) {
        case 'success':
            console.log(`✅ ${result.code.value} on ${result.acquisition.fullNumber.withPlusPrefix()} after ${result.attempts} attempt(s)`);
            break;
        case 'halt':
            console.log(`⏸️  Halted: ${result.reason}`);
            break;
        case 'failure':
            console.error(`❌ Failed after ${result.attempts} attempt(s): ${result.error.message}`);
            break;
    }
}

main().catch(console.error);
