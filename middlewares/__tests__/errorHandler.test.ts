import httpMocks from "node-mocks-http";
import { describe, it, expect, vi } from "vitest";
import { NotFoundError } from "../../utils/errors";
import errorHandler from "../errorHandler";

describe("errorHandler", () => {
  it("answers an AppError with its status and message", () => {
    const req = httpMocks.createRequest({ method: "GET", url: "/countries/Atlantis" });
    const res = httpMocks.createResponse();
    const next = vi.fn();

    errorHandler(new NotFoundError("Country not found"), req, res, next);

    expect(res.statusCode).toBe(404);
    expect(res._getJSONData()).toEqual({ error: "Country not found" });
    expect(next).not.toHaveBeenCalled();
  });

  it("hands the error on once headers are already sent", () => {
    const req = httpMocks.createRequest({ method: "GET", url: "/countries/image" });
    const res = httpMocks.createResponse();
    Object.defineProperty(res, "headersSent", { value: true });
    const next = vi.fn();
    const err = new Error("client aborted");

    errorHandler(err, req, res, next);

    expect(next).toHaveBeenCalledWith(err);
    expect(res.statusCode).toBe(200);
    expect(res._isEndCalled()).toBe(false);
  });
});
