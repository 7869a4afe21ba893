import { Router } from "express";

export interface HealthInfo {
  service: string;
  version: string;
}

/**
 * Liveness only. Does not check that the vector store or the LLM API are reachable.
 */
export function createHealthRouter(info: HealthInfo): Router {
  const router = Router();
  router.get("/health", (_req, res) => {
    res.json({ status: "ok", service: info.service, version: info.version });
  });
  return router;
}
