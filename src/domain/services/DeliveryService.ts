import { LogEventLevel } from '../value-objects/LogEventLevel';

export interface AcceptedOutcome {
  readonly kind: 'accepted';
  readonly minimumLevelAccepted: LogEventLevel | null;
}

export interface RejectedOutcome {
  readonly kind: 'rejected';
  readonly status: number;
  readonly body: string;
  readonly payload: string;
}

export interface TransientFailureOutcome {
  readonly kind: 'transient';
  readonly status?: number;
  readonly body?: string;
  readonly error?: string;
}

export type DeliveryOutcome = AcceptedOutcome | RejectedOutcome | TransientFailureOutcome;

export interface DeliveryService {
  /**
   * POST one batch of raw JSON lines. Never rejects: transport errors come
   * back as a transient outcome.
   */
  deliver(lines: readonly string[]): Promise<DeliveryOutcome>;
}
