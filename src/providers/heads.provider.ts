import { WebSocketProvider } from "ethers";
import WebSocket from "ws";
import { z } from "zod";
import { HeadKind, SubscriptionError, describeError } from "../utils/errors";
import { RpcHeaderSchema } from "../utils/types/rpc.types";
import { HeadListener } from "../utils/types/tracker.types";
import logger from "../utils/logger";

const NotificationSchema = z.object({
  method: z.literal("eth_subscription"),
  params: z.object({
    subscription: z.string(),
    result: z.unknown(),
  }),
});

type Notification = z.infer<typeof NotificationSchema>["params"];

function parseNotification(message: string): Notification | null {
  let payload: unknown;
  try {
    payload = JSON.parse(message);
  } catch {
    return null;
  }

  const parsed = NotificationSchema.safeParse(payload);
  return parsed.success ? parsed.data.params : null;
}

/**
 * A WebSocket connection carrying exactly one raw `eth_subscribe` stream.
 *
 * ethers only understands the subscription kinds it created itself, so
 * notifications are intercepted before they reach the base provider.
 * Notifications that arrive before `eth_subscribe` has answered are held
 * until the subscription id is known.
 */
export class HeadsSocketProvider extends WebSocketProvider {
  private subscriptionId: string | null = null;
  private early: Notification[] = [];
  private failed: boolean = false;
  private released: boolean = false;
  private failSubscribe: ((error: SubscriptionError) => void) | null = null;
  private readonly socket: WebSocket;

  constructor(
    private readonly wsUrl: string,
    private readonly kind: HeadKind,
    private readonly listener: HeadListener
  ) {
    const socket = new WebSocket(wsUrl);
    super(socket);
    this.socket = socket;

    socket.on("close", (code: number) => {
      this.raise(
        new SubscriptionError(`${kind} socket closed (code ${code})`, kind, true)
      );
    });

    socket.on("error", (error: Error) => {
      this.raise(
        new SubscriptionError(`${kind} socket error`, kind, true, {
          cause: error,
        })
      );
    });
  }

  /**
   * Issue `eth_subscribe` for this connection's kind.
   * A rejected request is reported as a non-transient SubscriptionError;
   * losing the socket before the answer arrives rejects with the transient
   * socket error.
   */
  async subscribeHeads(): Promise<string> {
    const socketFailure = new Promise<never>((_resolve, reject) => {
      this.failSubscribe = reject;
    });

    const request = this.send("eth_subscribe", [this.kind]).catch(
      (error: unknown) => {
        throw new SubscriptionError(
          `eth_subscribe ${this.kind} rejected: ${describeError(error)}`,
          this.kind,
          false,
          { cause: error }
        );
      }
    );

    let id: unknown;
    try {
      id = await Promise.race([request, socketFailure]);
    } finally {
      this.failSubscribe = null;
    }

    if (typeof id !== "string") {
      throw new SubscriptionError(
        `eth_subscribe ${this.kind} returned no subscription id`,
        this.kind,
        false
      );
    }

    this.subscriptionId = id;
    logger.info("Subscribed to node heads", {
      kind: this.kind,
      subscriptionId: id,
      wsUrl: this.wsUrl,
    });

    const early = this.early;
    this.early = [];
    for (const notification of early) {
      if (notification.subscription === id) {
        this.deliver(notification.result);
      }
    }

    return id;
  }

  /** Unsubscribe if the socket still allows it, then close it. */
  async close(): Promise<void> {
    if (this.released) {
      return;
    }

    const id = this.subscriptionId;
    this.released = true;

    if (id && this.socket.readyState === WebSocket.OPEN) {
      try {
        await this.send("eth_unsubscribe", [id]);
      } catch (error) {
        logger.warn("Failed to unsubscribe from node heads", {
          kind: this.kind,
          subscriptionId: id,
          error,
        });
      }
    }

    await this.destroy();
    logger.info("Closed head subscription", { kind: this.kind });
  }

  async _processMessage(message: string): Promise<void> {
    const notification = parseNotification(message);
    if (!notification) {
      return super._processMessage(message);
    }

    if (this.subscriptionId === null) {
      this.early.push(notification);
      return;
    }

    if (notification.subscription !== this.subscriptionId) {
      logger.debug("Ignoring notification for another subscription", {
        kind: this.kind,
        subscriptionId: notification.subscription,
      });
      return;
    }

    this.deliver(notification.result);
  }

  private deliver(result: unknown): void {
    if (this.failed || this.released) {
      return;
    }

    const parsed = RpcHeaderSchema.safeParse(result);
    if (!parsed.success) {
      this.raise(
        new SubscriptionError(
          `Malformed ${this.kind} notification: ${parsed.error.message}`,
          this.kind,
          false
        )
      );
      return;
    }

    this.listener.onHeader(parsed.data);
  }

  private raise(error: SubscriptionError): void {
    if (this.failed || this.released) {
      return;
    }

    this.failed = true;

    if (this.failSubscribe) {
      this.failSubscribe(error);
      return;
    }

    this.listener.onError(error);
  }
}

export default HeadsSocketProvider;
