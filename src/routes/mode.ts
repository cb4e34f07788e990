import { Hono } from "hono";
import { isServiceMode, type AggregateService } from "../services/aggregate-service.ts";
import { logger, toError } from "../services/structured-logger.ts";

/**
 * GET|POST /mode/{test|live} - Forward a data-source mode switch to the
 * data service and send the browser back to the index page.
 *
 * The switch is not awaited; a failed forward only shows up in the logs.
 */
export function createModeRoutes(service: AggregateService): Hono {
  const modeRoutes = new Hono();

  modeRoutes.on(["GET", "POST"], "/:mode", (c) => {
    const mode = c.req.param("mode");
    if (!isServiceMode(mode)) {
      return c.notFound();
    }

    logger.info("mode", `Switching to ${mode.toUpperCase()} mode`);
    void service.setMode(mode).catch((err: unknown) => {
      logger.error("mode", `Failed to switch to ${mode} mode`, toError(err));
    });

    return c.redirect("/", 303);
  });

  return modeRoutes;
}
