import {
  HeadKind,
  SubscriptionError,
  describeError,
  isTransientConnectionError,
  toError,
} from "../utils/errors";
import { RpcHeader } from "../utils/types/rpc.types";
import {
  HeadSubscription,
  NodeProvider,
  SubscriptionStatus,
  TrackerEvent,
} from "../utils/types/tracker.types";
import logger from "../utils/logger";

export interface SupervisorOptions {
  retryDelay: number;
  maxRetries: number;
}

interface SubscriptionState {
  subscription: HeadSubscription | null;
  active: boolean;
  reconnects: number;
  lastError?: string;
}

const HEAD_KINDS: HeadKind[] = ["newHeads", "newSideHeads"];

const toEvent = (kind: HeadKind, header: RpcHeader): TrackerEvent =>
  kind === "newHeads" ? { kind: "head", header } : { kind: "side", header };

/**
 * Keeps the canonical-head and side-head subscriptions alive and forwards
 * their headers to the tracker.
 *
 * A transient failure replaces only the affected subscription; anything
 * else, or running out of retries, is handed to `onFatal`.
 */
export class SubscriptionSupervisor {
  private states: Map<HeadKind, SubscriptionState> = new Map();
  private recoveries: Set<Promise<void>> = new Set();
  private stopped: boolean = false;

  constructor(
    private provider: NodeProvider,
    private sink: (event: TrackerEvent) => void,
    private onFatal: (error: Error) => void,
    private options: SupervisorOptions
  ) {
    for (const kind of HEAD_KINDS) {
      this.states.set(kind, { subscription: null, active: false, reconnects: 0 });
    }
  }

  /** Subscribe to both head kinds. Fails if either subscription fails. */
  async start(): Promise<void> {
    this.stopped = false;

    for (const kind of HEAD_KINDS) {
      await this.subscribe(kind);
    }

    logger.info("Head subscriptions started", { kinds: HEAD_KINDS });
  }

  /** Waits for any recovery in progress, then releases both subscriptions. */
  async stop(): Promise<void> {
    this.stopped = true;
    await this.whenSettled();

    for (const kind of HEAD_KINDS) {
      await this.release(kind);
    }

    logger.info("Head subscriptions stopped");
  }

  /** Resolves once every recovery in progress has finished. */
  async whenSettled(): Promise<void> {
    while (this.recoveries.size > 0) {
      await Promise.all([...this.recoveries]);
    }
  }

  getStatus(): SubscriptionStatus[] {
    return HEAD_KINDS.map((kind) => {
      const state = this.state(kind);
      return {
        kind,
        active: state.active,
        reconnects: state.reconnects,
        lastError: state.lastError,
      };
    });
  }

  private state(kind: HeadKind): SubscriptionState {
    const state = this.states.get(kind);
    if (!state) {
      throw new Error(`Unknown subscription kind: ${kind}`);
    }
    return state;
  }

  private async subscribe(kind: HeadKind): Promise<void> {
    const state = this.state(kind);

    state.subscription = await this.provider.subscribe(kind, {
      onHeader: (header) => {
        if (!this.stopped) {
          this.sink(toEvent(kind, header));
        }
      },
      onError: (error) => this.handleError(kind, error),
    });
    state.active = true;
  }

  private async release(kind: HeadKind): Promise<void> {
    const state = this.state(kind);
    const subscription = state.subscription;

    state.subscription = null;
    state.active = false;

    if (!subscription) {
      return;
    }

    try {
      await subscription.unsubscribe();
    } catch (error) {
      logger.warn("Failed to release head subscription", { kind, error });
    }
  }

  private handleError(kind: HeadKind, error: SubscriptionError): void {
    if (this.stopped) {
      return;
    }

    const state = this.state(kind);
    state.active = false;
    state.lastError = describeError(error);

    if (!isTransientConnectionError(error)) {
      logger.error("Head subscription failed", { kind, error });
      this.onFatal(error);
      return;
    }

    logger.warn("Head subscription dropped, resubscribing", { kind, error });

    const recovery = this.resubscribe(kind)
      .catch((failure) => {
        if (!this.stopped) {
          this.onFatal(toError(failure));
        }
      })
      .finally(() => {
        this.recoveries.delete(recovery);
      });
    this.recoveries.add(recovery);
  }

  private async resubscribe(kind: HeadKind): Promise<void> {
    await this.release(kind);

    const state = this.state(kind);
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.options.maxRetries; attempt++) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.retryDelay)
      );

      if (this.stopped) {
        return;
      }

      try {
        await this.subscribe(kind);
        state.reconnects++;
        logger.info("Head subscription re-established", {
          kind,
          attempt,
          reconnects: state.reconnects,
        });
        return;
      } catch (error) {
        if (!isTransientConnectionError(error)) {
          throw error;
        }

        lastError = error;
        state.lastError = describeError(error);
        logger.warn("Retrying head subscription", {
          kind,
          retry: attempt,
          maxRetries: this.options.maxRetries,
          error,
        });
      }
    }

    throw new SubscriptionError(
      `Could not re-establish ${kind} after ${this.options.maxRetries} attempts`,
      kind,
      false,
      { cause: lastError }
    );
  }
}

export default SubscriptionSupervisor;
