import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../config/featureFlags", () => ({
  isRoleplayAiEnabled: () => true,
}));

import { createRoleplayController } from "../roleplayController";

function makeRes() {
  const res: any = { locals: { requestId: "rid-1" } };
  res.status = vi.fn(() => res);
  res.json = vi.fn(() => res);
  return res;
}

const generateJson = vi.fn(async (_prompt: string) => "");

const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});

describe("roleplayController", () => {
  beforeEach(() => {
    generateJson.mockReset();
    generateJson.mockResolvedValue("");
    logSpy.mockClear();
  });

  it("generate-scenario returns the model scenario", async () => {
    generateJson.mockResolvedValueOnce(
      '{"scenario":"You are at a train station.","question_in_language":"Wo ist Gleis drei?","question_english":"Where is platform three?"}'
    );
    const { generateScenario } = createRoleplayController({ generateJson });
    const res = makeRes();

    await generateScenario({ query: { language: "de-DE" } } as any, res);

    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({
      scenario: "You are at a train station.",
      question_in_language: "Wo ist Gleis drei?",
      question_english: "Where is platform three?",
      language: "de-DE",
    });
    expect(logSpy).toHaveBeenCalledWith(
      '{"level":"info","msg":"roleplay_scenario","requestId":"rid-1","language":"de-DE","source":"ai"}'
    );
  });

  it("generate-scenario rejects unsupported languages", async () => {
    const { generateScenario } = createRoleplayController({ generateJson });
    const res = makeRes();

    await generateScenario({ query: { language: "klingon" } } as any, res);

    expect(res.status).toHaveBeenCalledWith(400);
    expect(generateJson).not.toHaveBeenCalled();
  });

  it("generate-scenario answers 500 when the client throws", async () => {
    const errSpy = vi.spyOn(console, "error").mockImplementation(() => {});
    generateJson.mockRejectedValueOnce(new Error("socket hang up"));
    const { generateScenario } = createRoleplayController({ generateJson });
    const res = makeRes();

    await generateScenario({ query: {} } as any, res);

    expect(res.status).toHaveBeenCalledWith(500);
    expect(res.json).toHaveBeenCalledWith({ error: "Server error", code: "SERVER_ERROR", requestId: "rid-1" });
    expect(errSpy).toHaveBeenCalledWith("[roleplay.generateScenario] requestId=rid-1 Error socket hang up");
    errSpy.mockRestore();
  });

  it("evaluate-response requires every text field", async () => {
    const { evaluateResponse } = createRoleplayController({ generateJson });
    const res = makeRes();

    await evaluateResponse(
      { body: { scenario: "s", question_in_language: "q", user_response: "r" } } as any,
      res
    );

    expect(res.status).toHaveBeenCalledWith(400);
    expect(res.json).toHaveBeenCalledWith({
      error: "question_english is required",
      code: "INVALID_REQUEST",
      requestId: "rid-1",
    });
  });

  it("evaluate-response accepts an empty reply", async () => {
    generateJson.mockResolvedValueOnce(
      '{"needs_improvement":true,"original":null,"better":"I am fine, thanks."}'
    );
    const { evaluateResponse } = createRoleplayController({ generateJson });
    const res = makeRes();

    await evaluateResponse(
      { body: { scenario: "s", question_in_language: "q", question_english: "e", user_response: "  " } } as any,
      res
    );

    expect(generateJson).toHaveBeenCalledTimes(1);
    expect(generateJson.mock.calls[0][0]).toContain("Learner's reply: \n");
    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({ needs_improvement: true, original: "", better: "I am fine, thanks." });
  });

  it("evaluate-response falls back when the model gives nothing usable", async () => {
    const { evaluateResponse } = createRoleplayController({ generateJson });
    const res = makeRes();

    await evaluateResponse(
      {
        body: {
          scenario: "s",
          question_in_language: "Kumusta ka?",
          question_english: "How are you?",
          user_response: "Mabuti",
          language: "tl-PH",
        },
      } as any,
      res
    );

    expect(generateJson).toHaveBeenCalledTimes(2);
    expect(generateJson.mock.calls[0][0]).toContain("Evaluate a Tagalog learner's reply");
    expect(res.status).toHaveBeenCalledWith(200);
    expect(res.json).toHaveBeenCalledWith({ needs_improvement: false, original: null, better: null });
    expect(logSpy).toHaveBeenCalledWith(
      '{"level":"info","msg":"roleplay_evaluation","requestId":"rid-1","language":"tl-PH","source":"fallback"}'
    );
  });
});
