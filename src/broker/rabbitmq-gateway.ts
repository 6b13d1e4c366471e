import amqp from "amqplib";
import type { Options } from "amqplib";
import { errorMessage, MessageFormatError, PublishError } from "../errors";
import type { Job, ResultEvent, ResultHandler } from "../types";
import { type Logger, silentLogger } from "../utils/logger";
import type { BrokerGateway } from "./broker-gateway";
import { decodeResultMessage, encodeDispatch } from "./messages";

// The subset of an amqplib message the gateway reads
export interface AmqpMessage {
  content: Buffer;
  fields: { deliveryTag: number; redelivered: boolean; routingKey: string };
}

// The subset of an amqplib confirm channel the gateway drives
export interface AmqpChannel {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  assertQueue(queue: string, options?: Options.AssertQueue): Promise<unknown>;
  bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
  prefetch(count: number): Promise<unknown>;
  publish(
    exchange: string,
    routingKey: string,
    content: Buffer,
    options: Options.Publish,
    callback: (err: unknown) => void,
  ): boolean;
  consume(
    queue: string,
    onMessage: (message: AmqpMessage | null) => void,
    options?: Options.Consume,
  ): Promise<unknown>;
  ack(message: AmqpMessage): void;
  nack(message: AmqpMessage, allUpTo?: boolean, requeue?: boolean): void;
  close(): Promise<void>;
  on(event: "close" | "error", listener: (arg?: unknown) => void): unknown;
}

export interface AmqpConnection {
  createConfirmChannel(): Promise<AmqpChannel>;
  close(): Promise<void>;
  on(event: "close" | "error", listener: (arg?: unknown) => void): unknown;
}

export type AmqpConnect = (url: string) => Promise<AmqpConnection>;

export interface RabbitMQGatewayOptions {
  url: string;
  exchange?: string;
  resultsQueue?: string;
  resultRoutingKeys?: string[];
  deadLetterExchange?: string;
  prefetch?: number;
  publishTimeoutMs?: number;
  reconnectInitialDelayMs?: number;
  reconnectMaxDelayMs?: number;
  /** Delay before a message whose handler failed is requeued; doubles per consecutive failure */
  requeueInitialDelayMs?: number;
  requeueMaxDelayMs?: number;
  logger?: Logger;
  connect?: AmqpConnect;
}

/**
 * BrokerGateway over a RabbitMQ topic exchange.
 *
 * Dispatches go out as `jobs.execute.<job_type>` on a confirm channel;
 * results arrive on a durable queue bound to `jobs.completed` and
 * `jobs.failed`. Connection loss triggers reconnection with exponential
 * backoff, after which every registered consumer is restarted and the broker
 * redelivers whatever was left unacknowledged. A message whose handler fails
 * is held for a backoff delay before it is requeued.
 */
export class RabbitMQGateway implements BrokerGateway {
  private readonly url: string;
  private readonly exchange: string;
  private readonly resultsQueue: string;
  private readonly resultRoutingKeys: string[];
  private readonly deadLetterExchange?: string;
  private readonly prefetch: number;
  private readonly publishTimeoutMs: number;
  private readonly reconnectInitialDelayMs: number;
  private readonly reconnectMaxDelayMs: number;
  private readonly requeueInitialDelayMs: number;
  private readonly requeueMaxDelayMs: number;
  private readonly logger: Logger;
  private readonly connectFn: AmqpConnect;

  private connection: AmqpConnection | null = null;
  private channel: AmqpChannel | null = null;
  private readonly handlers: ResultHandler[] = [];
  private reconnectTimer?: NodeJS.Timeout;
  private reconnectDelayMs: number;
  private readonly requeueTimers: Set<NodeJS.Timeout> = new Set();
  private handlerFailures: number = 0;
  private closing: boolean = false;

  constructor(options: RabbitMQGatewayOptions) {
    this.url = options.url;
    this.exchange = options.exchange || "jobs";
    this.resultsQueue = options.resultsQueue || "scheduler.job-results";
    this.resultRoutingKeys = options.resultRoutingKeys || ["jobs.completed", "jobs.failed"];
    this.deadLetterExchange = options.deadLetterExchange;
    this.prefetch = options.prefetch || 10;
    this.publishTimeoutMs = options.publishTimeoutMs || 5000;
    this.reconnectInitialDelayMs = options.reconnectInitialDelayMs || 1000;
    this.reconnectMaxDelayMs = options.reconnectMaxDelayMs || 30000;
    this.reconnectDelayMs = this.reconnectInitialDelayMs;
    this.requeueInitialDelayMs = options.requeueInitialDelayMs || 1000;
    this.requeueMaxDelayMs = options.requeueMaxDelayMs || 30000;
    this.logger = options.logger ?? silentLogger;
    this.connectFn = options.connect ?? ((url) => amqp.connect(url));
  }

  /**
   * Opens the connection, declares the exchange and starts any consumers
   * registered so far. Rejects if the first connection attempt fails.
   */
  async connect(): Promise<void> {
    if (this.channel) {
      this.logger.info("Already connected to RabbitMQ");
      return;
    }
    this.closing = false;
    await this.establish();
    this.logger.info("Connected to RabbitMQ", { exchange: this.exchange });
  }

  isConnected(): boolean {
    return this.channel !== null;
  }

  async publish(job: Job): Promise<void> {
    const channel = this.channel;
    if (!channel) {
      throw new PublishError("Not connected to RabbitMQ, cannot publish", { jobId: job.id });
    }

    const routingKey = `jobs.execute.${job.jobType}`;
    const body = Buffer.from(JSON.stringify(encodeDispatch(job)));
    const confirmed = new Promise<void>((resolve, reject) => {
      channel.publish(
        this.exchange,
        routingKey,
        body,
        {
          persistent: true,
          contentType: "application/json",
          messageId: job.id,
          type: "jobs.execute",
          timestamp: Math.floor(Date.now() / 1000),
        },
        (err) => (err ? reject(err) : resolve()),
      );
    });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`No broker confirm within ${this.publishTimeoutMs}ms`)),
        this.publishTimeoutMs,
      );
    });

    try {
      await Promise.race([confirmed, timeout]);
    } catch (error) {
      throw new PublishError(`Failed to publish job ${job.id} to ${routingKey}: ${errorMessage(error)}`, {
        jobId: job.id,
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }
    this.logger.debug("Published message", { jobId: job.id, routingKey });
  }

  async consume(handler: ResultHandler): Promise<void> {
    this.handlers.push(handler);
    if (this.channel) {
      await this.startConsumer(this.channel, handler);
    }
  }

  async close(): Promise<void> {
    this.closing = true;
    clearTimeout(this.reconnectTimer);
    this.reconnectTimer = undefined;
    // Held messages stay unacked; the broker redelivers them once the channel closes
    for (const timer of this.requeueTimers) clearTimeout(timer);
    this.requeueTimers.clear();

    const { channel, connection } = this;
    this.channel = null;
    this.connection = null;
    try {
      await channel?.close();
    } catch (error) {
      this.logger.warn("Error closing RabbitMQ channel", { error });
    }
    try {
      await connection?.close();
      this.logger.info("Disconnected from RabbitMQ");
    } catch (error) {
      this.logger.error("Error disconnecting from RabbitMQ", { error });
    }
  }

  /**
   * Opens a connection and a confirm channel and starts every registered
   * consumer on it. The gateway only adopts the connection once all of that
   * succeeded; otherwise the connection is closed and the error rethrown.
   */
  private async establish(): Promise<void> {
    const connection = await this.connectFn(this.url);
    connection.on("error", (error) => this.logger.error("Connection error", { error }));

    let channel: AmqpChannel;
    try {
      channel = await connection.createConfirmChannel();
      channel.on("error", (error) => this.logger.error("Channel error", { error }));
      await channel.assertExchange(this.exchange, "topic", { durable: true });
      await channel.prefetch(this.prefetch);
      for (const handler of this.handlers) {
        await this.startConsumer(channel, handler);
      }
    } catch (error) {
      await connection.close().catch((closeError: unknown) => {
        this.logger.debug("Error closing half-open connection", { error: closeError });
      });
      throw error;
    }

    connection.on("close", () => this.handleDisconnect(connection));
    channel.on("close", () => this.handleDisconnect(connection));

    this.connection = connection;
    this.channel = channel;
    this.reconnectDelayMs = this.reconnectInitialDelayMs;
  }

  private handleDisconnect(connection: AmqpConnection): void {
    if (this.connection !== connection) return;
    this.connection = null;
    this.channel = null;
    connection.close().catch((error: unknown) => {
      this.logger.debug("Connection already closed", { error });
    });
    if (this.closing) return;
    this.logger.warn("Lost connection to RabbitMQ");
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer || this.closing) return;
    const delay = this.reconnectDelayMs;
    this.logger.info("Reconnecting to RabbitMQ", { delayMs: delay });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.establish().then(
        () => this.logger.info("Reconnected to RabbitMQ"),
        (error: unknown) => {
          this.logger.error("Reconnect to RabbitMQ failed", { error });
          this.reconnectDelayMs = Math.min(delay * 2, this.reconnectMaxDelayMs);
          this.scheduleReconnect();
        },
      );
    }, delay);
  }

  private async startConsumer(channel: AmqpChannel, handler: ResultHandler): Promise<void> {
    if (this.deadLetterExchange) {
      await channel.assertExchange(this.deadLetterExchange, "fanout", { durable: true });
      await channel.assertQueue(`${this.resultsQueue}.dead-letter`, { durable: true });
      await channel.bindQueue(`${this.resultsQueue}.dead-letter`, this.deadLetterExchange, "");
    }
    await channel.assertQueue(this.resultsQueue, {
      durable: true,
      deadLetterExchange: this.deadLetterExchange,
    });
    for (const routingKey of this.resultRoutingKeys) {
      await channel.bindQueue(this.resultsQueue, this.exchange, routingKey);
      this.logger.debug("Bound results queue", { queue: this.resultsQueue, routingKey });
    }

    await channel.consume(
      this.resultsQueue,
      (message) => {
        if (message === null) return;
        this.onMessage(channel, message, handler).catch((error: unknown) => {
          this.logger.error("Unhandled error in consume callback", { error });
        });
      },
      { noAck: false },
    );
    this.logger.info("Consuming results", { queue: this.resultsQueue });
  }

  private async onMessage(channel: AmqpChannel, message: AmqpMessage, handler: ResultHandler): Promise<void> {
    let event: ResultEvent;
    try {
      event = decodeResultMessage(message.content);
    } catch (error) {
      const detail = error instanceof MessageFormatError ? error.message : errorMessage(error);
      this.logger.error("Rejecting malformed result message", {
        routingKey: message.fields.routingKey,
        detail,
        body: message.content.toString("utf8"),
      });
      this.settle(channel, message, "reject");
      return;
    }

    try {
      await handler(event);
      this.handlerFailures = 0;
      this.settle(channel, message, "ack");
    } catch (error) {
      const delayMs = this.requeueLater(channel, message);
      this.logger.error("Error processing result message, requeueing", {
        jobId: event.jobId,
        kind: error instanceof Error ? error.name : typeof error,
        delayMs,
        error,
      });
    }
  }

  // Holds the message (and its prefetch slot) before handing it back to the broker
  private requeueLater(channel: AmqpChannel, message: AmqpMessage): number {
    const delayMs = Math.min(
      this.requeueInitialDelayMs * 2 ** this.handlerFailures,
      this.requeueMaxDelayMs,
    );
    this.handlerFailures++;
    const timer = setTimeout(() => {
      this.requeueTimers.delete(timer);
      this.settle(channel, message, "requeue");
    }, delayMs);
    this.requeueTimers.add(timer);
    return delayMs;
  }

  // A channel that closed mid-handler throws here; the broker redelivers after reconnect.
  private settle(channel: AmqpChannel, message: AmqpMessage, how: "ack" | "reject" | "requeue"): void {
    try {
      if (how === "ack") channel.ack(message);
      else channel.nack(message, false, how === "requeue");
    } catch (error) {
      this.logger.warn("Could not settle message", { how, deliveryTag: message.fields.deliveryTag, error });
    }
  }
}
