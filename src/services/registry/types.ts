/**
 * Severity tier, 0 = most critical, 4 = least.
 */
export type Severity = 0 | 1 | 2 | 3 | 4;

export const SEVERITIES: readonly Severity[] = [0, 1, 2, 3, 4];

export function isSeverity(value: unknown): value is Severity {
  return typeof value === 'number' && (SEVERITIES as readonly number[]).includes(value);
}

export interface EmailReceiver {
  kind: 'email';
  name: string;
  address: string;
}

export interface SmsReceiver {
  kind: 'sms';
  name: string;
  countryCode: string;
  number: string;
}

export interface WebhookReceiver {
  kind: 'webhook';
  name: string;
  uri: string;
  useCommonSchema: boolean;
}

export interface RoleReceiver {
  kind: 'role';
  name: string;
  roleId: string;
}

/** One notification channel. */
export type Receiver = EmailReceiver | SmsReceiver | WebhookReceiver | RoleReceiver;

export type ReceiverKind = Receiver['kind'];

export interface ActionGroup {
  id: string;
  name: string;
  /** At most 12 characters, unique across the registry. */
  shortName: string;
  receivers: readonly Receiver[];
}

/** A registered group with the version it was stored under. */
export interface VersionedActionGroup extends ActionGroup {
  version: number;
}

/** Severity tier -> extra action group ids notified for that tier. */
export type EscalationTable = ReadonlyMap<Severity, readonly string[]>;
