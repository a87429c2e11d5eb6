import { PollConfig, PollConfigError } from '../src';

function show(name: string, config: PollConfig) {
    const maxPolls = Math.ceil(config.timeoutMs / config.pollIntervalMs);
    console.log(`${name.padEnd(10)} timeout ${config.timeoutMs / 1000}s, every ${config.pollIntervalMs / 1000}s (up to ${maxPolls} polls)`);
}

show('fast', PollConfig.fast());
show('balanced', PollConfig.balanced());
show('patient', PollConfig.patient());
show('custom', PollConfig.builder().timeout(180000).pollInterval(4000).tryBuild());

try {
    PollConfig.builder().timeout(5000).tryBuild();
} catch (error: unknown) {
    if (!(error instanceof PollConfigError)) throw error;
    console.log(`rejected   ${error.code}: ${error.message}`);
}
