import { Router } from "express";
import { ConfigManager } from "../config/config.manager";
import { describeError } from "../errors/sync.errors";
import logger from "../utils/logger";

const router = Router();

router.get("/health", (_req, res) => {
  res.status(200).json({
    status: "ok",
    timestamp: new Date().toISOString(),
    uptime: process.uptime(),
    environment: process.env.NODE_ENV,
  });
});

/**
 * Ready when configuration loads. Upstream systems are not called: a
 * probe must not open FileMaker sessions.
 */
router.get("/health/ready", (_req, res) => {
  const checks: { configuration: string; warnings: string[]; timestamp: string } = {
    configuration: "unknown",
    warnings: [],
    timestamp: new Date().toISOString(),
  };

  try {
    checks.warnings = ConfigManager.getInstance().warnings();
    checks.configuration = checks.warnings.length ? "degraded" : "valid";

    res.status(200).json({ status: "ready", checks });
  } catch (err) {
    logger.error("Readiness check failed", { error: describeError(err) });
    checks.configuration = "invalid";
    res.status(503).json({ status: "not ready", checks });
  }
});

router.get("/health/live", (_req, res) => {
  res.status(200).json({
    status: "alive",
    timestamp: new Date().toISOString(),
  });
});

export default router;
