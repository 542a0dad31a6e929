/**
 * Monitor domain types: slots, filters, scheduler state and cycle outcomes.
 */

/** Chat-platform identity of a user (Telegram chat ids are stored as strings) */
export type UserId = string;

/** Test centre code as used by the booking site, e.g. `london` */
export type CenterId = string;

/**
 * Inclusive calendar range, both ends `YYYY-MM-DD`
 */
export interface DateRange {
  start: string;
  end: string;
}

/**
 * Validated search preferences for one monitor
 */
export interface FilterSpec {
  /** Non-empty, without duplicates */
  centers: readonly CenterId[];
  dateRange?: DateRange;
  /** Ordered tokens: `morning`, `afternoon`, `evening`, `any` or `HH:MM` */
  timePreferences: readonly string[];
}

/**
 * A single bookable appointment. Frozen once parsed.
 */
export interface AppointmentSlot {
  readonly center: CenterId;
  /** `YYYY-MM-DD` */
  readonly date: string;
  /** `HH:MM` */
  readonly time: string;
  readonly testType: string;
  readonly bookingUrl?: string;
}

export interface Credentials {
  username: string;
  password: string;
}

export type MonitorState = 'idle' | 'authenticating' | 'polling' | 'backoff' | 'cancelled';

export type CheckFailureKind = 'auth' | 'navigation' | 'unexpected';

export type CycleOutcome =
  | { ok: true; slotsFound: number; admitted: number }
  | { ok: false; kind: CheckFailureKind; message: string };

/**
 * How a monitor task ended
 */
export type MonitorExit =
  | { reason: 'cancelled'; cycles: number }
  | { reason: 'failed'; cycles: number; error: string };

/**
 * Delivers admitted slots to the user. Failures are logged by the caller, not retried.
 */
export interface Notifier {
  notify(userId: UserId, slots: readonly AppointmentSlot[]): Promise<void>;
}
