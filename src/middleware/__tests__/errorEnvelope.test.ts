//src/middleware/__tests__/errorEnvelope.test.ts

import { describe, it, expect, vi } from "vitest";
import { errorEnvelopeMiddleware } from "../errorEnvelope";

describe("errorEnvelopeMiddleware", () => {
  it("adds requestId to error payloads", () => {
    const req: any = {};
    const res: any = { locals: { requestId: "rid-test" } };

    const originalJson = vi.fn(() => res);
    res.json = originalJson;

    const next = vi.fn();
    errorEnvelopeMiddleware(req, res, next);

    res.json({ error: "Unsupported language", code: "INVALID_REQUEST" });

    expect(originalJson).toHaveBeenCalledWith({
      error: "Unsupported language",
      code: "INVALID_REQUEST",
      requestId: "rid-test",
    });
    expect(next).toHaveBeenCalled();
  });

  it("does not touch conversation payloads", () => {
    const req: any = {};
    const res: any = { locals: { requestId: "rid-test" } };

    const originalJson = vi.fn(() => res);
    res.json = originalJson;

    errorEnvelopeMiddleware(req, res, () => {});
    res.json({ ai_message: "How are you?", conversation_ended: false });

    expect(originalJson).toHaveBeenCalledWith({ ai_message: "How are you?", conversation_ended: false });
  });

  it("leaves errors alone without a request id", () => {
    const req: any = {};
    const res: any = { locals: {} };

    const originalJson = vi.fn(() => res);
    res.json = originalJson;

    errorEnvelopeMiddleware(req, res, () => {});
    res.json({ error: "Not Found" });

    expect(originalJson).toHaveBeenCalledWith({ error: "Not Found" });
  });
});
