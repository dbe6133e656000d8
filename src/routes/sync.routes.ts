import { Router } from "express";
import { SyncController } from "../controllers/sync.controller";
import { asyncHandler } from "../middleware/error.middleware";

export const createSyncRouter = (controller: SyncController): Router => {
  const router = Router();
  const handler = asyncHandler(controller.sendPlates);

  router.get("/send_plates", handler);
  router.post("/send_plates", handler);

  return router;
};
