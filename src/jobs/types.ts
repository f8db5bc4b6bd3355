export interface BuildCaptionsJobData {
  runId: string;
}

export type JobData = BuildCaptionsJobData;
