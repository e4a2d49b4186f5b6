import express, { type Request, type Response } from "express";
import path from "path";
import { readFileSync } from "fs";
import swaggerUi from "swagger-ui-express";
import type { Exporter } from "../metrics/exporter.js";
import type { LatestReadings } from "../stationState.js";

const webDir = path.join(process.cwd(), "src", "web");

export interface WebRouterDeps {
  exporter: Exporter;
  latest: LatestReadings;
}

export function createWebRouter({ exporter, latest }: WebRouterDeps): express.Router {
  const router = express.Router();

  router.get("/healthz", (_req: Request, res: Response) => {
    res.type("text/plain").send("ok");
  });

  router.get("/metrics", async (_req: Request, res: Response) => {
    try {
      const { contentType, body } = await exporter.encode();
      res.set("Content-Type", contentType).send(body);
    } catch (error) {
      console.error("Error encoding metrics:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  });

  router.get("/api/observation", (_req: Request, res: Response) => {
    try {
      const snapshot = latest.snapshot();
      if (!snapshot) {
        return res.status(404).json({ error: "No fresh observation" });
      }
      res.json(snapshot);
    } catch (error) {
      console.error("Error building observation snapshot:", error);
      res.status(500).json({ error: "Internal Server Error" });
    }
  });

  // API Documentation with Swagger UI
  const swaggerDocument: unknown = JSON.parse(readFileSync(path.join(webDir, "swagger.json"), "utf8"));
  const swaggerOptions = {
    customCss: ".swagger-ui .topbar { display: none }",
    customSiteTitle: "Weather Station Exporter API",
    swaggerOptions: {
      docExpansion: "list",
      defaultModelsExpandDepth: 1,
    },
  };
  if (typeof swaggerDocument === "object" && swaggerDocument !== null) {
    router.use("/docs", swaggerUi.serve, swaggerUi.setup(swaggerDocument, swaggerOptions));
  }

  return router;
}
