import { z } from "zod";
import { errorMessage, MessageFormatError } from "../errors";
import type { DispatchMessage, Job, ResultEvent } from "../types";

export const ResultMessage = z.object({
  job_id: z.string().min(1),
  outcome: z.enum(["success", "failure"]),
  error_detail: z.string().nullish(),
  emitted_at: z.string().datetime({ offset: true }),
  result: z.unknown().optional(),
  execution_duration_ms: z.number().int().nonnegative().nullish(),
});
export type ResultMessage = z.infer<typeof ResultMessage>;

// The attempt a dispatch message starts is the one after the last committed dispatch
export function encodeDispatch(job: Job): DispatchMessage {
  return {
    job_id: job.id,
    job_type: job.jobType,
    payload: job.payload,
    attempt_count: job.attemptCount + 1,
  };
}

export function decodeResultMessage(content: Buffer | string): ResultEvent {
  let body: unknown;
  try {
    body = JSON.parse(typeof content === "string" ? content : content.toString("utf8"));
  } catch (error) {
    throw new MessageFormatError(`Failed to decode message: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = ResultMessage.safeParse(body);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new MessageFormatError(`Invalid result message: ${issues}`, { cause: parsed.error });
  }

  const message = parsed.data;
  return {
    jobId: message.job_id,
    outcome: message.outcome,
    errorDetail: message.error_detail ?? undefined,
    emittedAt: new Date(message.emitted_at),
    result: message.result,
    executionDurationMs: message.execution_duration_ms ?? undefined,
  };
}
