import express from "express";
import cors from "cors";
import expressWinston from "express-winston";
import { createCountriesController } from "./controllers/countries.controller";
import errorHandler, { notFoundHandler } from "./middlewares/errorHandler";
import { createCountriesRouter } from "./routes/countries.routes";
import type { CountryService } from "./services/countries.service";
import logger from "./utils/logger";

export interface AppOptions {
  service: CountryService;
  allowedOrigins?: string[];
}

export function createApp({ service, allowedOrigins = ["*"] }: AppOptions) {
  const app = express();

  app.use(
    cors({
      origin: allowedOrigins.includes("*") ? "*" : allowedOrigins,
    })
  );
  app.use(express.json());
  app.use(
    expressWinston.logger({
      winstonInstance: logger,
      meta: false,
      msg: "HTTP {{req.method}} {{req.url}} {{res.statusCode}} {{res.responseTime}}ms",
      expressFormat: false,
      colorize: false,
    })
  );

  app.get("/", (req, res) => {
    res.json({ message: "Country Currency & Exchange API", status: "running" });
  });
  app.use("/", createCountriesRouter(createCountriesController(service)));

  app.use(expressWinston.errorLogger({ winstonInstance: logger }));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
