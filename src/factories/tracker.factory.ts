import { DataSource } from "typeorm";
import { NodeProvider } from "../utils/types/tracker.types";
import { EnvConfig } from "../utils/types/config.types";
import { HeadersService } from "../services/headers.service";
import { StatusService } from "../services/status.service";
import { SubscriptionSupervisor } from "../services/subscription.service";
import OrphanTracker from "../services/tracker.service";
import { HeaderEntity } from "../entities/header.entity";
import { TransactionEntity } from "../entities/transaction.entity";
import logger from "../utils/logger";

export interface TrackerBundle {
  tracker: OrphanTracker;
  supervisor: SubscriptionSupervisor;
  status: StatusService;
  headers: HeadersService;
}

/**
 * Factory wiring the tracker to its store and subscriptions
 */
export class TrackerFactory {
  /**
   * @param provider - Node the tracker reads from
   * @param dataSource - Initialized store
   * @param config - Tracker, retry and database settings
   * @param onFatal - Called once the tracker or a subscription cannot recover
   */
  static createTracker(
    provider: NodeProvider,
    dataSource: DataSource,
    config: Pick<EnvConfig, "tracker" | "retryDelay" | "maxRetries">,
    onFatal: (error: Error) => void
  ): TrackerBundle {
    logger.info("Creating orphan tracker", {
      ...config.tracker,
      retryDelay: config.retryDelay,
      maxRetries: config.maxRetries,
    });

    const headers = new HeadersService(
      dataSource.getRepository(HeaderEntity),
      dataSource.getRepository(TransactionEntity)
    );
    const status = new StatusService();
    const tracker = new OrphanTracker(provider, headers, status, config.tracker);

    const supervisor = new SubscriptionSupervisor(
      provider,
      (event) => tracker.push(event),
      onFatal,
      { retryDelay: config.retryDelay, maxRetries: config.maxRetries }
    );

    return { tracker, supervisor, status, headers };
  }
}

export default TrackerFactory;
