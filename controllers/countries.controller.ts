import type { Request, Response, NextFunction } from "express";
import { z } from "zod";
import { SORT_KEYS } from "../models/country";
import type { CountryService } from "../services/countries.service";
import { ValidationError } from "../utils/errors";

const listQuerySchema = z.object({
  region: z.string().min(1, "must not be empty").optional(),
  currency: z.string().min(1, "must not be empty").optional(),
  sort: z
    .enum(SORT_KEYS, {
      errorMap: () => ({ message: `must be one of ${SORT_KEYS.join(", ")}` }),
    })
    .optional(),
});

function parseListQuery(query: unknown) {
  const parsed = listQuerySchema.safeParse(query);
  if (!parsed.success) {
    const details: Record<string, string> = {};
    for (const issue of parsed.error.issues) {
      details[issue.path.join(".") || "query"] = issue.message;
    }
    throw new ValidationError(details);
  }
  return parsed.data;
}

export function createCountriesController(service: CountryService) {
  async function refreshData(req: Request, res: Response, next: NextFunction) {
    try {
      const summary = await service.refresh();
      res.status(200).json(summary);
    } catch (err) {
      next(err);
    }
  }

  async function getAllCountries(req: Request, res: Response, next: NextFunction) {
    try {
      const filters = parseListQuery(req.query);
      const countries = await service.list(filters);
      res.status(200).json(countries);
    } catch (err) {
      next(err);
    }
  }

  async function getCountryByName(req: Request, res: Response, next: NextFunction) {
    try {
      const country = await service.getByName(req.params.name ?? "");
      res.status(200).json(country);
    } catch (err) {
      next(err);
    }
  }

  async function deleteCountryByName(req: Request, res: Response, next: NextFunction) {
    try {
      await service.deleteByName(req.params.name ?? "");
      res.status(200).json({ message: "Country deleted successfully" });
    } catch (err) {
      next(err);
    }
  }

  async function getStatus(req: Request, res: Response, next: NextFunction) {
    try {
      res.status(200).json(await service.status());
    } catch (err) {
      next(err);
    }
  }

  async function getSummaryImage(req: Request, res: Response, next: NextFunction) {
    try {
      const imgPath = await service.summaryImage();
      res.type("png").sendFile(imgPath, (err) => {
        if (err) next(err);
      });
    } catch (err) {
      next(err);
    }
  }

  return {
    refreshData,
    getAllCountries,
    getCountryByName,
    deleteCountryByName,
    getStatus,
    getSummaryImage,
  };
}

export type CountriesController = ReturnType<typeof createCountriesController>;
