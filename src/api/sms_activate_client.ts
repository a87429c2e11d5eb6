import axios, { AxiosInstance } from 'axios';
import {
    SmsActivateResponseError,
    SmsActivateTransportError,
    parseSmsActivateError,
} from './sms_activate_errors';

export const DEFAULT_SMS_ACTIVATE_URL = 'https://api.sms-activate.org/stubs/handler_api.php';

export enum ActivationStatus {
    REQUEST_ANOTHER_CODE = 3,
    FINISH_ACTIVATION = 6,
    CANCEL_ACTIVATION = 8,
}

export type SetStatusResponse = 'ACCESS_READY' | 'ACCESS_RETRY_GET' | 'ACCESS_ACTIVATION' | 'ACCESS_CANCEL';

const SET_STATUS_RESPONSES: readonly SetStatusResponse[] = [
    'ACCESS_READY',
    'ACCESS_RETRY_GET',
    'ACCESS_ACTIVATION',
    'ACCESS_CANCEL',
];

export interface GetNumberResponse {
    activationId: string;
    phoneNumber: string;
    activationCost: number | null;
    countryCode: string | null;
}

export interface ReceivedMessage {
    code: string;
    text: string;
    dateTime: string | null;
}

export interface GetStatusResponse {
    sms: ReceivedMessage | null;
    call: ReceivedMessage | null;
}

/**
 * Thin client for the SMS-Activate handler API: GET requests with the action
 * and API key in the query string. Errors arrive as plain-text tokens with
 * HTTP 200; successful replies are JSON or `ACCESS_*` text.
 */
export class SmsActivateClient {
    private client: AxiosInstance;

    constructor(private readonly apiKey: string, endpoint: string = DEFAULT_SMS_ACTIVATE_URL) {
        this.client = axios.create({
            baseURL: endpoint,
            responseType: 'text',
            timeout: 10000,
        });

        this.setupInterceptors();
    }

    private setupInterceptors() {
        this.client.interceptors.response.use(
            (response) => response,
            (error: unknown) => {
                if (axios.isAxiosError(error)) {
                    if (error.response) {
                        const status = error.response.status;
                        throw new SmsActivateTransportError(`SMS-Activate HTTP error: ${status}`, status);
                    }
                    throw new SmsActivateTransportError(`SMS-Activate request failed: ${error.message}`, null);
                }
                throw error;
            }
        );
    }

    /**
     * Activation Lifecycle
     */
    async getNumber(countryId: number, service: string, signal?: AbortSignal): Promise<GetNumberResponse> {
        const data = await this.requestJson('getNumberV2', { service, country: String(countryId) }, signal);

        const activationId = readId(data, 'activationId');
        const phoneNumber: unknown = Reflect.get(data, 'phoneNumber');
        if (activationId === null || typeof phoneNumber !== 'string' || phoneNumber.length === 0) {
            throw new SmsActivateResponseError('getNumberV2 response is missing activationId or phoneNumber', JSON.stringify(data));
        }

        const cost: unknown = Reflect.get(data, 'activationCost');
        const countryCode: unknown = Reflect.get(data, 'countryCode');
        return {
            activationId,
            phoneNumber,
            activationCost: typeof cost === 'number' ? cost : null,
            countryCode: typeof countryCode === 'string' ? countryCode : null,
        };
    }

    async getStatus(activationId: string, signal?: AbortSignal): Promise<GetStatusResponse> {
        const data = await this.requestJson('getStatusV2', { id: activationId }, signal);
        return {
            sms: readMessage(Reflect.get(data, 'sms')),
            call: readMessage(Reflect.get(data, 'call')),
        };
    }

    async setStatus(activationId: string, status: ActivationStatus): Promise<SetStatusResponse> {
        const text = await this.requestText('setStatus', { id: activationId, status: String(status) });
        const reply = SET_STATUS_RESPONSES.find((candidate) => candidate === text);
        if (reply === undefined) {
            throw new SmsActivateResponseError(`Unexpected setStatus response: ${text}`, text);
        }
        return reply;
    }

    async getBalance(): Promise<number> {
        const text = await this.requestText('getBalance', {});
        const match = /^ACCESS_BALANCE:\s*(-?[0-9]+(?:\.[0-9]+)?)$/.exec(text);
        if (!match) {
            throw new SmsActivateResponseError(`Unexpected getBalance response: ${text}`, text);
        }
        return Number(match[1]);
    }

    /**
     * Returns the trimmed body; throws on error tokens. An aborted `signal`
     * fails the request as a transport error.
     */
    private async requestText(action: string, params: Record<string, string>, signal?: AbortSignal): Promise<string> {
        const response = await this.client.get<unknown>('', {
            params: { api_key: this.apiKey, action, ...params },
            signal,
        });

        const body = typeof response.data === 'string'
            ? response.data
            : response.data === undefined || response.data === null ? '' : JSON.stringify(response.data);
        const text = body.trim();

        const serviceError = parseSmsActivateError(text);
        if (serviceError) {
            console.warn(`[SmsActivate] ${action} returned ${serviceError.raw}`);
            throw serviceError;
        }
        return text;
    }

    private async requestJson(action: string, params: Record<string, string>, signal?: AbortSignal): Promise<object> {
        const text = await this.requestText(action, params, signal);

        let parsed: unknown;
        try {
            parsed = JSON.parse(text);
        } catch (error: unknown) {
            throw new SmsActivateResponseError(
                `Failed to parse ${action} response: ${error instanceof Error ? error.message : String(error)}`,
                text
            );
        }
        if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
            throw new SmsActivateResponseError(`Expected a JSON object from ${action}`, text);
        }
        return parsed;
    }
}

function readId(data: object, key: string): string | null {
    const value: unknown = Reflect.get(data, key);
    if (typeof value === 'string' && value.trim().length > 0) return value.trim();
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return null;
}

function readMessage(value: unknown): ReceivedMessage | null {
    if (typeof value !== 'object' || value === null) return null;
    const code: unknown = Reflect.get(value, 'code');
    const text: unknown = Reflect.get(value, 'text');
    const dateTime: unknown = Reflect.get(value, 'dateTime');
    return {
        code: typeof code === 'string' ? code : '',
        text: typeof text === 'string' ? text : '',
        dateTime: typeof dateTime === 'string' ? dateTime : null,
    };
}
