/** Durable snapshot of an in-progress run, written after every state-changing step. */
export interface AgentStateCheckpoint {
  isRunning: boolean;
  currentStep: string;
  iterationCount: number;
  errorMessage?: string;
  /** ISO-8601 timestamp of when the checkpoint was taken. */
  timestamp: string;
}
