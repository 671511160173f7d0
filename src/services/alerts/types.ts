import { AlertRule } from '../config/types';
import { RegistrySnapshot } from '../registry/ActionGroupRegistry';

export type AlertState = 'Pending' | 'Firing' | 'Resolved';

/**
 * One alert episode of a rule. A rule has at most one non-Resolved instance;
 * a breach after Resolved supersedes it with a new instance.
 */
export interface AlertInstance {
  id: string;
  ruleId: string;
  /** 1-based episode counter per rule. */
  sequence: number;
  state: AlertState;
  consecutiveBreaches: number;
  consecutiveClears: number;
  firstBreachAt: string | null;
  firedAt: string | null;
  resolvedAt: string | null;
  lastEvaluatedAt: string | null;
  /** Minted when the instance fires; stable for the whole episode. */
  correlationId: string | null;
  /** Last time a Fired or StillFiring notice went out. */
  lastNotifiedAt: string | null;
}

export type TransitionType = 'Fired' | 'StillFiring' | 'Resolved';

export enum AlertEventType {
  FIRED = 'alert:fired',
  STILL_FIRING = 'alert:still_firing',
  RESOLVED = 'alert:resolved',
}

export const TRANSITION_EVENT_TYPES: Record<TransitionType, AlertEventType> = {
  Fired: AlertEventType.FIRED,
  StillFiring: AlertEventType.STILL_FIRING,
  Resolved: AlertEventType.RESOLVED,
};

export interface TransitionEvent {
  type: TransitionType;
  rule: AlertRule;
  /** Frozen copy taken right after the transition. */
  instance: Readonly<AlertInstance>;
  correlationId: string;
  timestamp: string;
  /** True for a resolution requested through manualResolve. */
  manual: boolean;
  /** Registry view captured when the evaluation started. */
  registry?: RegistrySnapshot;
}

export interface TransitionContext {
  now?: Date;
  registry?: RegistrySnapshot;
}
