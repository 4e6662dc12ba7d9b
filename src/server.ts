import express, { NextFunction, Request, Response } from "express";
import cors from "cors";
import { hexlify } from "ethers";
import { TransactionEntity } from "./entities/transaction.entity";
import { QueryService } from "./services/query.service";
import { StatusService } from "./services/status.service";
import { SubscriptionSupervisor } from "./services/subscription.service";
import OrphanTracker from "./services/tracker.service";
import { RawQueryError, describeError } from "./utils/errors";
import { HeaderRecord } from "./utils/types/tracker.types";
import logger from "./utils/logger";

export interface ServerDependencies {
  status: StatusService;
  tracker: OrphanTracker;
  supervisor: SubscriptionSupervisor;
  queries: QueryService;
  allowRawSql: boolean;
}

export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

type QueryValue = Request["query"][string];

/** Non-negative integer query parameter; absent or empty means undefined. */
export function parseInteger(
  value: QueryValue,
  name: string
): number | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  if (typeof value !== "string" || !/^\d+$/.test(value)) {
    throw new BadRequestError(`${name} must be a non-negative integer`);
  }

  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new BadRequestError(`${name} is out of range`);
  }
  return parsed;
}

export function parseBoolean(
  value: QueryValue,
  name: string
): boolean | undefined {
  if (value === undefined || value === "") {
    return undefined;
  }
  if (value === "true" || value === "1") {
    return true;
  }
  if (value === "false" || value === "0") {
    return false;
  }
  throw new BadRequestError(`${name} must be true or false`);
}

type HeaderView = Omit<HeaderRecord, "extraData"> & {
  extraData: string;
  transactions?: TransactionView[];
};

type TransactionView = Omit<TransactionEntity, "headers"> & {
  headers?: HeaderView[];
};

/** JSON shape of a header: `extraData` as hex, relations presented too. */
export function presentHeader(
  header: Readonly<HeaderRecord> & { transactions?: TransactionEntity[] }
): HeaderView {
  const { extraData, transactions, ...rest } = header;
  const view: HeaderView = { ...rest, extraData: hexlify(extraData) };

  if (transactions) {
    view.transactions = transactions.map(presentTransaction);
  }
  return view;
}

export function presentTransaction(
  transaction: TransactionEntity
): TransactionView {
  const { headers, ...rest } = transaction;
  const view: TransactionView = { ...rest };

  if (headers) {
    view.headers = headers.map(presentHeader);
  }
  return view;
}

const handle =
  (handler: (req: Request, res: Response) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };

/**
 * Setup API server
 */
export function createServer(deps: ServerDependencies): express.Application {
  const app = express();

  app.use(cors({ methods: ["GET"] }));

  app.use((req, res, next) => {
    const started = Date.now();
    res.on("finish", () => {
      logger.http("HTTP request", {
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        duration: Date.now() - started,
      });
    });
    next();
  });

  app.get("/ping", (_req, res) => {
    res.type("text/plain").send("pong");
  });

  app.get("/health", (_req, res) => {
    const tracker = deps.tracker.getStatus();
    const subscriptions = deps.supervisor.getStatus();
    const healthy =
      tracker.isRunning && subscriptions.every((entry) => entry.active);

    res.status(healthy ? 200 : 503).json({
      status: healthy ? "UP" : "DEGRADED",
      timestamp: new Date().toISOString(),
      tracker,
      subscriptions,
      queueDepth: tracker.queueDepth,
    });
  });

  app.get("/status", (_req, res) => {
    const snapshot = deps.status.getSnapshot();

    res.json({
      uptime: snapshot.uptime,
      chain_id: snapshot.chainId,
      latest_header: snapshot.latestHeader
        ? presentHeader(snapshot.latestHeader)
        : null,
    });
  });

  app.get(
    "/api/headers",
    handle(async (req, res) => {
      const rawSql = req.query.raw_sql;
      if (typeof rawSql === "string" && rawSql !== "") {
        res.json(await runRawSql(deps, rawSql));
        return;
      }

      const headers = await deps.queries.listHeaders({
        limit: parseInteger(req.query.limit, "limit"),
        offset: parseInteger(req.query.offset, "offset"),
        orphan: parseBoolean(req.query.orphan, "orphan"),
        numberMin: parseInteger(req.query.number_min, "number_min"),
        numberMax: parseInteger(req.query.number_max, "number_max"),
        timestampMin: parseInteger(req.query.timestamp_min, "timestamp_min"),
        timestampMax: parseInteger(req.query.timestamp_max, "timestamp_max"),
        includeTransactions: req.query.include_txes !== "false",
      });

      res.json(headers.map(presentHeader));
    })
  );

  app.get(
    "/api/txes",
    handle(async (req, res) => {
      const rawSql = req.query.raw_sql;
      if (typeof rawSql === "string" && rawSql !== "") {
        res.json(await runRawSql(deps, rawSql));
        return;
      }

      const transactions = await deps.queries.listTransactions({
        limit: parseInteger(req.query.limit, "limit"),
        offset: parseInteger(req.query.offset, "offset"),
        includeHeaders: req.query.include_headers !== "false",
      });

      res.json(transactions.map(presentTransaction));
    })
  );

  app.use(
    (error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof BadRequestError || error instanceof RawQueryError) {
        res.status(400).json({ error: error.message });
        return;
      }

      logger.error("API request failed", { url: req.originalUrl, error });
      res.status(500).json({ error: describeError(error) });
    }
  );

  return app;
}

async function runRawSql(
  deps: ServerDependencies,
  sql: string
): Promise<unknown> {
  if (!deps.allowRawSql) {
    throw new BadRequestError("raw_sql is disabled");
  }
  return deps.queries.rawQuery(sql);
}
