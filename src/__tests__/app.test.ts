// src/__tests__/app.test.ts

import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import type { Server } from "node:http";
import { createApp } from "../app";
import { loadSettings } from "../config/settings";
import { loadPhrasePools } from "../content/phrasePools";
import { SessionProgressTracker } from "../state/sessionProgressTracker";

// Real express stack on an ephemeral loopback port, no external services.
describe("app", () => {
  let server: Server;
  let baseUrl = "";

  beforeAll(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    let n = 0;
    const app = createApp({
      settings: loadSettings({ AUTH_TOKEN: "test-secret" }),
      tracker: new SessionProgressTracker({
        pools: loadPhrasePools(),
        random: () => 0.99,
        createId: () => `conv-${++n}`,
      }),
      aiClient: { generateJson: async () => "" },
    });
    server = app.listen(0);
    await new Promise<void>((resolve) => server.once("listening", () => resolve()));
    const addr = server.address();
    if (!addr || typeof addr === "string") throw new Error("server did not bind a TCP port");
    baseUrl = `http://127.0.0.1:${addr.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    vi.restoreAllMocks();
  });

  function post(path: string, body?: unknown, token = "test-secret") {
    return fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "content-type": "application/json", authorization: `Bearer ${token}` },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  it("serves health without auth", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("requires the token elsewhere", async () => {
    const res = await post("/conversation/start", {}, "wrong");
    expect(res.status).toBe(401);
    const body: any = await res.json();
    expect(body.code).toBe("UNAUTHORIZED");
    expect(body.requestId).toBe(res.headers.get("x-request-id"));
  });

  it("runs a conversation over HTTP", async () => {
    const start = await post("/conversation/start?language=es-ES");
    expect(await start.json()).toEqual({ conversation_id: "conv-1", ai_message: "¿Cómo estás?" });

    const retry = await post("/conversation/reply", {
      conversation_id: "conv-1",
      user_message: "como estas",
      language: "es-ES",
    });
    expect(await retry.json()).toEqual({ ai_message: "Please say ¿Cómo estás? again.", conversation_ended: false });

    const next = await post("/conversation/reply", {
      conversation_id: "conv-1",
      user_message: "Cómo estás",
      language: "es-ES",
    });
    expect(await next.json()).toEqual({
      ai_message: "La puesta de sol fue hermosa ayer.",
      conversation_ended: false,
    });
  });

  it("lists supported languages", async () => {
    const res = await fetch(`${baseUrl}/languages`, { headers: { "x-auth-token": "test-secret" } });
    const body: any = await res.json();
    expect(body.default_language).toBe("en-US");
    expect(body.total_languages).toBe(20);
    expect(body.supported_languages["tl-PH"]).toBe("Tagalog");
  });

  it("describes the service at the root", async () => {
    const res = await fetch(`${baseUrl}/`, { headers: { "x-auth-token": "test-secret" } });
    expect(await res.json()).toEqual({
      name: "Language Learning Platform",
      description: "Conversation and roleplay practice for language learners",
      version: "2.0.0",
      endpoints: {
        languages: "/languages",
        conversation: "/conversation",
        roleplay: "/roleplay",
        health: "/health",
      },
    });
  });

  it("answers 400 for malformed JSON", async () => {
    const res = await fetch(`${baseUrl}/conversation/reply`, {
      method: "POST",
      headers: { "content-type": "application/json", authorization: "Bearer test-secret" },
      body: "{ nope",
    });
    expect(res.status).toBe(400);
    const body: any = await res.json();
    expect(body.error).toBe("Request body must be valid JSON");
  });

  it("answers 404 for unknown routes", async () => {
    const res = await post("/dictionary");
    expect(res.status).toBe(404);
    const body: any = await res.json();
    expect(body.code).toBe("NOT_FOUND");
  });
});
