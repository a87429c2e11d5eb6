import { VerificationService } from '../application/verification_service';
import { CancelledError, classifyError, describeError } from '../domain/errors';
import { AcquisitionResult, CountryCode, VerificationCode } from '../domain/models';

/**
 * 1. DEFINITIONS: Public and Internal Types
 */

export const DEFAULT_MAX_OPERATION_ATTEMPTS = 3;

export interface VerificationRequest<TService> {
    service: TService;
    /** Rent in this country only. Mutually exclusive with `countries`. */
    country?: CountryCode;
    /** Candidate countries in order of preference; the provider's list when both are omitted. */
    countries?: readonly CountryCode[];
    /** Total acquire-and-wait rounds, the first one included. */
    maxOperationAttempts?: number;
    signal?: AbortSignal;
}

export type WorkflowResult =
    | { status: 'success'; acquisition: AcquisitionResult; code: VerificationCode; attempts: number }
    | { status: 'halt'; reason: string; attempts: number }
    | { status: 'failure'; error: Error; attempts: number };

type StepResult<T> =
    | { status: 'success'; data: T }
    | { status: 'halt'; reason: string }
    | { status: 'failure'; error: Error };

interface Context<TService> {
    readonly request: VerificationRequest<TService>;
    readonly service: VerificationService<TService>;
    readonly acquisition?: AcquisitionResult;
    readonly code?: VerificationCode;
}

type Step<TService> = (ctx: Context<TService>) => Promise<StepResult<Context<TService>>>;

function ok<T>(data: T): StepResult<T> { return { status: 'success', data }; }
function fail<T>(error: unknown): StepResult<T> {
    return { status: 'failure', error: error instanceof Error ? error : new Error(String(error)) };
}
function halt<T>(reason: string): StepResult<T> { return { status: 'halt', reason }; }

/**
 * 2. STEPS
 */

// Step 0: Validation
async function validateRequest<TService>(ctx: Context<TService>): Promise<StepResult<Context<TService>>> {
    const { request } = ctx;
    if (String(request.service).trim().length === 0) return fail(new Error('Missing service'));
    if (request.country !== undefined && request.countries !== undefined) {
        return fail(new Error('Specify either country or countries, not both'));
    }
    if (request.country !== undefined && request.country.trim().length === 0) {
        return fail(new Error('country cannot be empty'));
    }
    const max = request.maxOperationAttempts ?? DEFAULT_MAX_OPERATION_ATTEMPTS;
    if (!Number.isInteger(max) || max < 1) {
        return fail(new Error(`maxOperationAttempts must be a positive integer, got ${max}`));
    }
    return ok(ctx);
}

// Step 1: Rent a number
async function acquire<TService>(ctx: Context<TService>): Promise<StepResult<Context<TService>>> {
    const { request, service } = ctx;
    if (request.signal?.aborted) return halt('Aborted before acquisition');

    try {
        const acquisition = request.country !== undefined
            ? await service.acquireNumber(request.country, request.service, request.signal)
            : await service.acquireNumberFromAny(request.service, request.countries, request.signal);
        return ok({ ...ctx, acquisition });
    } catch (error: unknown) {
        return fail(error);
    }
}

// Step 2: Wait for the code
async function awaitCode<TService>(ctx: Context<TService>): Promise<StepResult<Context<TService>>> {
    const { request, service, acquisition } = ctx;
    if (!acquisition) return fail(new Error('Invalid state: no number acquired'));

    try {
        const code = request.signal
            ? await service.waitForCodeCancellable(acquisition.taskId, request.signal)
            : await service.waitForCode(acquisition.taskId);
        return ok({ ...ctx, code });
    } catch (error: unknown) {
        if (error instanceof CancelledError) return halt(error.message);
        return fail(error);
    }
}

// Step 3: Mark the code as used. Best-effort.
async function finish<TService>(ctx: Context<TService>): Promise<StepResult<Context<TService>>> {
    const { service, acquisition } = ctx;
    if (!acquisition) return fail(new Error('Invalid state: no number acquired'));

    try {
        await service.finish(acquisition.taskId);
    } catch (error: unknown) {
        console.warn(`[Workflow] Finish failed for task ${acquisition.taskId.value}: ${describeError(error)}`);
    }
    return ok(ctx);
}

async function runPipeline<TService>(
    steps: readonly Step<TService>[],
    ctx: Context<TService>
): Promise<StepResult<Context<TService>>> {
    let result: StepResult<Context<TService>> = ok(ctx);
    for (const step of steps) {
        if (result.status !== 'success') break;
        result = await step(result.data);
    }
    return result;
}

/**
 * 3. ORCHESTRATOR (Public Function)
 *
 * Acquire-and-wait rounds repeat while the failure's `shouldRetryOperation()`
 * is true and attempts remain. Holds no state between runs.
 */
export async function runVerificationWorkflow<TService>(
    request: VerificationRequest<TService>,
    deps: { service: VerificationService<TService> }
): Promise<WorkflowResult> {
    const initial: Context<TService> = { request, service: deps.service };

    const validated = await validateRequest(initial);
    if (validated.status === 'failure') return { status: 'failure', error: validated.error, attempts: 0 };
    if (validated.status === 'halt') return { status: 'halt', reason: validated.reason, attempts: 0 };

    const maxAttempts = request.maxOperationAttempts ?? DEFAULT_MAX_OPERATION_ATTEMPTS;
    let attempts = 0;
    let result: StepResult<Context<TService>> = halt('No attempt made');

    while (attempts < maxAttempts) {
        attempts++;
        result = await runPipeline<TService>([acquire, awaitCode], validated.data);

        if (result.status !== 'failure') break;
        if (!classifyError(result.error).retryOperation || attempts >= maxAttempts) break;

        console.warn(
            `[Workflow] Attempt ${attempts}/${maxAttempts} failed, acquiring a fresh number: ${result.error.message}`
        );
    }

    if (result.status === 'success') {
        result = await finish(result.data);
    }

    // Map internal result to public result
    if (result.status === 'halt') {
        console.log(`[Workflow] Halted: ${result.reason}`);
        return { status: 'halt', reason: result.reason, attempts };
    }
    if (result.status === 'failure') {
        console.error(`[Workflow] Failed after ${attempts} attempt(s): ${result.error.message}`);
        return { status: 'failure', error: result.error, attempts };
    }

    const { acquisition, code } = result.data;
    if (!acquisition || !code) {
        return { status: 'failure', error: new Error('Workflow completed but missing output data'), attempts };
    }

    return { status: 'success', acquisition, code, attempts };
}
