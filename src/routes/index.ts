import { Router } from "express";
import { SyncController } from "../controllers/sync.controller";
import { createSyncRouter } from "./sync.routes";

export const createRoutes = (controller: SyncController): Router => {
  const router = Router();

  router.use("/sync", createSyncRouter(controller));

  return router;
};
