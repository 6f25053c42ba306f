import { errorMessage } from "./errors.js";
import type { BoundedExecutor } from "./executor.js";
import type { Logger } from "./logger.js";

/**
 * Ask the engine to prepare `sql` without running it. Any failure (syntax,
 * unknown relation, several statements, timeout, closed connection)
 * collapses to false.
 *
 * No gate here: a DELETE can be reported valid and still be refused by
 * execute. Valid never means allowed.
 */
export async function isValidSql(executor: BoundedExecutor, sql: string, logger: Logger): Promise<boolean> {
  try {
    await executor.prepare(sql);
    return true;
  } catch (err) {
    logger.debug("statement failed validation", { error: errorMessage(err) });
    return false;
  }
}
