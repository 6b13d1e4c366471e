import type { Job, ResultHandler } from "../types";

export interface BrokerGateway {
  connect(): Promise<void>;
  /**
   * Publishes a dispatch envelope for the job's next attempt.
   * Rejects with PublishError when the broker is unreachable or refuses it.
   */
  publish(job: Job): Promise<void>;
  /**
   * Registers a handler for inbound result events. A message is acked only
   * after the handler resolves; a rejected handler gets the message requeued.
   */
  consume(handler: ResultHandler): Promise<void>;
  isConnected(): boolean;
  close(): Promise<void>;
}
