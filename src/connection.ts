import { existsSync } from "node:fs";
import type { Connection } from "./drivers/base.js";
import { DuckDbDriver } from "./drivers/duckdb.js";
import { NotFoundError, OpenFailureError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createSampleDatabase } from "./sample-data.js";

export interface OpenOptions {
  /** The reserved path that is seeded with sample data instead of failing when missing. */
  bootstrapPath: string;
  logger: Logger;
}

/**
 * Open the database file at `path`.
 *
 * A missing file is an error, except for the bootstrap path, which gets the
 * sample dataset written to it first. A file that exists but is not a DuckDB
 * database fails with OpenFailureError wrapping the engine's message.
 */
export async function openDatabase(path: string, options: OpenOptions): Promise<Connection> {
  const { bootstrapPath, logger } = options;

  if (!existsSync(path)) {
    if (path !== bootstrapPath) throw new NotFoundError("Database file", path);
    logger.info("creating sample database", { path });
    try {
      await createSampleDatabase(path);
    } catch (err) {
      throw new OpenFailureError(path, err);
    }
  }

  try {
    const driver = await DuckDbDriver.open(path);
    logger.debug("database opened", { path });
    return driver;
  } catch (err) {
    throw new OpenFailureError(path, err);
  }
}
