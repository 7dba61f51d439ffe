export type JobState =
  | "queued" // admitted, waiting for its executor
  | "building" // image build or pull in progress
  | "starting" // container being created
  | "health_checking" // polling the health probe
  | "succeeded" // deployed and healthy
  | "failed" // a step failed
  | "cancelled"; // cancelled by request

export type TerminalState = Extract<JobState, "succeeded" | "failed" | "cancelled">;

export const TERMINAL_STATES: readonly TerminalState[] = [
  "succeeded",
  "failed",
  "cancelled",
];

export const NON_TERMINAL_STATES: readonly JobState[] = [
  "queued",
  "building",
  "starting",
  "health_checking",
];

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  queued: ["building", "failed", "cancelled"],
  building: ["starting", "failed", "cancelled"],
  starting: ["health_checking", "failed", "cancelled"],
  health_checking: ["succeeded", "failed", "cancelled"],
  succeeded: [],
  failed: [],
  cancelled: [],
};

export function isTerminal(state: JobState): state is TerminalState {
  return TRANSITIONS[state].length === 0;
}

export function emptyStateCounts(): Record<JobState, number> {
  return {
    queued: 0,
    building: 0,
    starting: 0,
    health_checking: 0,
    succeeded: 0,
    failed: 0,
    cancelled: 0,
  };
}

export function canTransition(from: JobState, to: JobState): boolean {
  return TRANSITIONS[from].includes(to);
}
