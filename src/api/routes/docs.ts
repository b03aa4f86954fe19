import { Router } from "express";
import type { Request, Response } from "express";
import { openApiDocument, swaggerUiHtml } from "../openapi.js";

export function createDocsRoutes(): Router {
  const router = Router();

  router.get("/", (req: Request, res: Response): void => {
    res.type("html").send(swaggerUiHtml);
  });

  router.get("/openapi.json", (req: Request, res: Response): void => {
    res.json(openApiDocument);
  });

  return router;
}
