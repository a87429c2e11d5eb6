export * from './domain/models';
export * from './domain/errors';
export * from './domain/provider';
export * from './domain/retry_policy';
export * from './domain/poll_config';
export * from './domain/state_machine';
export * from './domain/dial_code_directory';

export * from './infrastructure/clock';
export * from './infrastructure/dial_code_directory';
export * from './infrastructure/sms_activate_provider';

export * from './application/retryable_provider';
export * from './application/verification_service';

export * from './workflow/polling_logic';
export * from './workflow/verification_workflow';

export * from './api/sms_activate_client';
export * from './api/sms_activate_errors';

export * from './config';
