import { Request, Response } from "express";
import { requestIdOf } from "../middleware/error.middleware";
import { collectParams, parseWith } from "../middleware/validation.middleware";
import {
  SEND_PLATES_PARAMS,
  SendPlatesParams,
  sendPlatesSchema,
} from "../schemas/request.schemas";
import { PlateSyncService } from "../services/plateSync.service";

export class SyncController {
  /**
   * @param getService resolved per request, so configuration problems
   *   surface as request errors instead of at import time
   * @param debugByDefault diagnostic output for every request (DEBUG env)
   */
  constructor(
    private readonly getService: () => PlateSyncService = () => PlateSyncService.getInstance(),
    private readonly debugByDefault = false,
  ) {}

  /**
   * GET|POST /send_plates?entity_type=Element&selected_ids=1,2,3&debug=1
   */
  public sendPlates = async (req: Request, res: Response): Promise<void> => {
    const params: SendPlatesParams = parseWith(
      sendPlatesSchema,
      collectParams(req, SEND_PLATES_PARAMS),
    );
    const service = this.getService();

    // Client went away before we answered: stop upstream work. The
    // FileMaker session is still closed by the session manager.
    const controller = new AbortController();
    const onClose = () => {
      if (!res.writableFinished) controller.abort();
    };
    res.on("close", onClose);

    try {
      const result = await service.synchronize({
        entityType: params.entity_type,
        ids: params.selected_ids,
        diagnostic: params.debug || this.debugByDefault,
        requestId: requestIdOf(res),
        signal: controller.signal,
      });

      res.status(200).json(result);
    } catch (error) {
      // Upstream failures caused by our own abort are reported as the abort
      controller.signal.throwIfAborted();
      throw error;
    } finally {
      res.off("close", onClose);
    }
  };
}
