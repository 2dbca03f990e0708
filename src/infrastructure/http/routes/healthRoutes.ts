import { Router } from "express";

export const createHealthRouter = (environment: string): Router => {
  const healthRouter = Router();

  healthRouter.get("/", (_req, res) => {
    res.json({ status: "ok", environment, timestamp: new Date().toISOString() });
  });

  return healthRouter;
};
