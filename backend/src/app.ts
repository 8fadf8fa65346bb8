import express, { type ErrorRequestHandler } from "express";
import cors from "cors";
import { recommend, toResponse, type Trace } from "./engine/recommend";
import type { Logger } from "./logger";
import { serializeTable } from "./table/doseTable";
import type { DoseTableStore } from "./table/doseTableStore";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export function createApp(store: DoseTableStore, log: Logger) {
  const app = express();
  app.use(cors());
  app.use(express.json());

  // --------------- Recommend API ----------
  app.post("/recommend", (req, res) => {
    const body: unknown = req.body;
    if (!isRecord(body) || Object.keys(body).length === 0) {
      log.error("Request rejected: No JSON data provided");
      return res.status(400).json({ error: "No JSON data provided" });
    }

    log.info(
      `Recommendation request: GRBS=${JSON.stringify(body.GRBS ?? [body.GRBS1, body.GRBS2, body.GRBS3, body.GRBS4, body.GRBS5])} ` +
        `route=${String(body.route)} diet_order=${String(body.diet_order)}`
    );

    const trace: Trace = (event) => log.debug(`step ${event.step}`, event);

    try {
      // Take the table once; a reload mid-request does not affect this call.
      const result = recommend(body, store.current(), trace);
      if (!result.success) {
        log.error(`Validation failed: ${result.error.message}`);
        return res.status(400).json({ error: `Invalid input: ${result.error.message}` });
      }

      const out = toResponse(result.data);
      log.info(
        `Recommendation: ${out.algorithm_used} level ${out.level}, ` +
          `${out.Suggested_insulin_dose} ${out.unit} (${out.action}), next check in ${out.next_grbs_after}h`
      );
      return res.json(out);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.error(`Error in recommendation endpoint: ${reason}`);
      return res.status(500).json({ error: `Internal server error: ${reason}` });
    }
  });

  // --------------- Table API ---------------
  app.get("/algorithms", (_req, res) => {
    res.json(serializeTable(store.current()));
  });

  // Malformed JSON bodies end up here from express.json().
  const onError: ErrorRequestHandler = (err: unknown, _req, res, next) => {
    if (res.headersSent) return next(err);
    if (isRecord(err) && err.type === "entity.parse.failed") {
      log.error("Request rejected: body is not valid JSON");
      return res.status(400).json({ error: "No JSON data provided" });
    }
    const reason = err instanceof Error ? err.message : String(err);
    // Client errors from the body parser (413 too large, 415 bad charset, ...) keep their status.
    const status = isRecord(err) ? err.status : undefined;
    if (typeof status === "number" && status >= 400 && status < 500) {
      log.error(`Request rejected: ${reason}`);
      return res.status(status).json({ error: reason });
    }
    log.error(`Unhandled error: ${reason}`);
    return res.status(500).json({ error: `Internal server error: ${reason}` });
  };
  app.use(onError);

  return app;
}
