import { Request, Response, Router } from "express";
import { AnalysisService } from "../analysis/analysis.service";
import { errorMessage, Logger } from "../config/logger";
import { RequestValidationError, StoreUnavailableError } from "../shared/errors";
import { isRecord, parseAnalyzeRequest } from "./analyze.schemas";

interface AnalyzeControllerDeps {
  analysisService: AnalysisService;
  logger: Logger;
}

export function buildAnalyzeController(deps: AnalyzeControllerDeps): Router {
  const router = Router();

  router.post("/analyze", async (request: Request, response: Response) => {
    deps.logger.info("Received request for /api/analyze");

    const body: unknown = request.body;
    if (!request.is("application/json") || !isRecord(body) || Object.keys(body).length === 0) {
      deps.logger.warn("Request received with no JSON body.");
      response.status(400).json({ error: "Request body must be JSON" });
      return;
    }

    try {
      const analysisRequest = parseAnalyzeRequest(body);
      deps.logger.info("Analysis request validated", { keywords: analysisRequest.keywords });

      const result = await deps.analysisService.analyze(analysisRequest);
      response.status(200).json(result);
    } catch (error) {
      if (error instanceof RequestValidationError) {
        deps.logger.warn("Request validation failed", { details: error.details });
        response.status(400).json({ error: error.message, details: error.details });
        return;
      }
      if (error instanceof StoreUnavailableError) {
        deps.logger.error("Analysis requested without a configured candidate store");
        response.status(503).json({ error: error.message });
        return;
      }
      deps.logger.error("An error occurred during the analysis process.", {
        error: errorMessage(error),
      });
      response.status(500).json({ error: "An internal error occurred during analysis." });
    }
  });

  return router;
}
