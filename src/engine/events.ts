import { EventEmitter } from "node:events";
import { logger as rootLogger, type Logger } from "../logger.js";
import type { OrderId, Owner, Price, Quantity, Side } from "./types.js";

export type EngineEvent =
  | { type: "OrderCreated"; orderId: OrderId; owner: Owner; side: Side; price: Price; quantity: Quantity }
  | { type: "OrderFilled"; orderId: OrderId; owner: Owner; counterparty: Owner; price: Price; quantity: Quantity }
  | {
      type: "OrderPartiallyFilled";
      orderId: OrderId;
      owner: Owner;
      counterparty: Owner;
      price: Price;
      quantity: Quantity;
      remainingQuantity: Quantity;
    }
  | { type: "OrderCanceled"; orderId: OrderId; owner: Owner; quantity: Quantity };

export type LoggedEvent = EngineEvent & { seq: bigint; pairId: string };

/**
 * Append-only audit trail of domain events. Each committed event gets the
 * next sequence number and is emitted as "event" to subscribers.
 *
 * Events are appended after the engine state is committed, so a listener
 * that throws is logged and skipped rather than failing the call.
 */
export class EventLog extends EventEmitter {
  private readonly events: LoggedEvent[] = [];
  private seq = 0n;

  constructor(private readonly log: Logger = rootLogger) {
    super();
  }

  /** Commits the events of one successful call, in order. */
  append(pairId: string, batch: readonly EngineEvent[]): LoggedEvent[] {
    const logged = batch.map((event) => {
      this.seq += 1n;
      return { ...event, seq: this.seq, pairId };
    });
    this.events.push(...logged);
    for (const event of logged) {
      try {
        this.emit("event", event);
      } catch (err) {
        this.log.error({ err, seq: event.seq.toString(), type: event.type }, "Event listener failed");
      }
    }
    return logged;
  }

  list(): readonly LoggedEvent[] {
    return this.events;
  }

  since(seq: bigint): LoggedEvent[] {
    return this.events.filter((e) => e.seq > seq);
  }

  /** Typed subscription; returns the unsubscribe function. */
  subscribe(listener: (event: LoggedEvent) => void): () => void {
    const guarded = (event: LoggedEvent): void => {
      try {
        listener(event);
      } catch (err) {
        this.log.error({ err, seq: event.seq.toString(), type: event.type }, "Event subscriber failed");
      }
    };
    this.on("event", guarded);
    return () => {
      this.off("event", guarded);
    };
  }
}
