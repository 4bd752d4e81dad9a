/**
 * Alerts Module - Types
 *
 * Directional alert state machine over the store's AlertState.
 */
import type { AlertChannel, AlertDirection, AlertState } from "../store/index.js";

/**
 * Result of feeding one observation into the state machine.
 * `next` equals the input state when nothing is emitted.
 */
export type Transition = Readonly<{
  emit: boolean;
  next: AlertState;
}>;

export type AlertSettings = Readonly<{
  demandThresholdWatts: number;
  dailyThresholdKwh: number;
  reportDemand: boolean;
  reportThresholdWatts: number;
  timezone: string;
}>;

/**
 * Why a channel produced no alert this cycle.
 */
export type SkipReason =
  | "insufficient_data"
  | "straddling_threshold"
  | "no_telemetry"
  | "unchanged";

export type AlertOutcome = Readonly<{
  channel: AlertChannel;
  /** Direction implied by the latest observation, null when undecided */
  implied: AlertDirection | null;
  value: number | null;
  /** Direction announced this cycle, null when nothing changed */
  emitted: AlertDirection | null;
  skipped: SkipReason | null;
  /** Whether a message reached the notifier (false when muted or failed) */
  delivered: boolean;
  /** Whether a demand report line was sent */
  reported: boolean;
}>;

/** Demand at or above this gets a warning marker in reports. */
export const DEMAND_WARNING_WATTS = 3000;
