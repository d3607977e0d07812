import type { RequestHandler } from "express";
import logger from "../utils/logger";

export const requestLogger: RequestHandler = (req, res, next) => {
  const start = process.hrtime.bigint();

  res.on("finish", () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    const fields = {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Number(durationMs.toFixed(3)),
    };
    if (res.statusCode >= 500) {
      logger.error(fields, "HTTP request failed");
    } else if (res.statusCode >= 400) {
      logger.warn(fields, "HTTP request rejected");
    } else {
      logger.debug(fields, "HTTP request completed");
    }
  });

  next();
};

export default requestLogger;
