import type { Server } from "node:http";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { createApp } from "./app";
import { loadEnv } from "./env";

let server: Server;
let baseUrl: string;

beforeEach(async () => {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
  const app = createApp(loadEnv({ TRACER_STREAM_FPS: "50" }));
  server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === "string") throw new Error("server has no port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterEach(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  vi.restoreAllMocks();
});

function post(path: string, body: unknown) {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

const BOX = "M0 0 L10 0 L10 10 L0 10 Z";

describe("health", () => {
  it("reports the service name and echoes the request id", async () => {
    const res = await fetch(`${baseUrl}/health`, { headers: { "x-request-id": "req-1" } });
    expect(res.status).toBe(200);
    expect(res.headers.get("x-request-id")).toBe("req-1");
    expect(await res.json()).toMatchObject({ ok: true, service: "@neon/api" });
  });

  it("logs one api_call line per request", async () => {
    await fetch(`${baseUrl}/health`, { headers: { "x-request-id": "req-2" } });
    await vi.waitFor(() => {
      const lines = vi.mocked(console.log).mock.calls.map((call) => JSON.parse(String(call[0])));
      expect(lines).toContainEqual(
        expect.objectContaining({ level: "info", event: "api_call", route: "GET /health", requestId: "req-2", status: 200 }),
      );
    });
  });
});

describe("patterns", () => {
  it("lists nine described patterns", async () => {
    const res = await fetch(`${baseUrl}/api/tracer/patterns`);
    const body = await res.json();
    expect(body).toHaveProperty("patterns.length", 9);
    expect(body).toHaveProperty("patterns.7", { number: 8, description: "Infinity" });
  });

  it("returns pattern commands at the requested size", async () => {
    const res = await fetch(`${baseUrl}/api/tracer/patterns/4/commands?size=100`);
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toMatchObject({ number: 4, size: 100 });
    expect(body).toHaveProperty("commands.0", { kind: "moveTo", to: { x: 26, y: 26 } });
  });

  it("rejects numbers outside 1-9", async () => {
    const res = await fetch(`${baseUrl}/api/tracer/patterns/12/commands`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid request",
      issues: ["n: Pattern must be an integer from 1 to 9"],
    });
  });
});

describe("curves", () => {
  it("registers path data and serves its summary", async () => {
    const created = await post("/api/tracer/curves", { id: "box", d: BOX });
    expect(created.status).toBe(201);
    expect(await created.json()).toMatchObject({
      curve: { id: "box", source: "path", segmentCount: 4, totalLength: 40 },
    });

    const fetched = await fetch(`${baseUrl}/api/tracer/curves/box`);
    expect(await fetched.json()).toMatchObject({ curve: { id: "box", totalLength: 40 } });
  });

  it("fits uploaded path data to the requested size", async () => {
    const created = await post("/api/tracer/curves", { d: BOX, size: 30 });
    expect(await created.json()).toMatchObject({ curve: { source: "path", totalLength: 120 } });
  });

  it("extracts a path from an svg document", async () => {
    const svg = '<svg><path d="M0 0 L10 0 L10 10 L0 10 Z"/></svg>';
    const created = await post("/api/tracer/curves", { svg, size: 300 });
    expect(created.status).toBe(201);
    expect(await created.json()).toMatchObject({ curve: { source: "svg", segmentCount: 4, totalLength: 1200 } });
  });

  it("rejects bodies with both or neither of d and svg", async () => {
    const both = await post("/api/tracer/curves", { d: BOX, svg: "<svg/>" });
    expect(both.status).toBe(400);
    expect(await both.json()).toEqual({ error: "Invalid request", issues: ["Provide exactly one of d or svg"] });

    const neither = await post("/api/tracer/curves", {});
    expect(neither.status).toBe(400);
  });

  it("reserves pattern ids", async () => {
    const res = await post("/api/tracer/curves", { id: "pattern-1", d: BOX });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid request",
      issues: ["id: Ids starting with 'pattern-' are reserved"],
    });
  });

  it("rejects path data without commands", async () => {
    const res = await post("/api/tracer/curves", { d: "123 456" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid request",
      issues: ["d: Path data contains no drawable commands"],
    });
  });

  it("answers 404 for unknown curves", async () => {
    const res = await fetch(`${baseUrl}/api/tracer/curves/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Curve not found" });
  });

  it("answers 400 for malformed JSON", async () => {
    const res = await fetch(`${baseUrl}/api/tracer/curves`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{",
    });
    expect(res.status).toBe(400);
  });
});

describe("frames", () => {
  it("computes a frame for an uploaded curve", async () => {
    await post("/api/tracer/curves", { id: "box", d: BOX });
    const res = await fetch(`${baseUrl}/api/tracer/frame?curve=box&bpm=60&now=1&count=1`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      curveId: "box",
      bpm: 60,
      now: 1,
      cycleSeconds: 4,
      baseProgress: 0.25,
      particles: [{ index: 0, progress: 0.25, point: { x: 10, y: 0 }, opacity: 1, size: 16, isLead: true }],
    });
  });

  it("defaults to pattern 1 and the configured particle count", async () => {
    const res = await fetch(`${baseUrl}/api/tracer/frame?bpm=60&now=0`);
    const body = await res.json();
    expect(body).toMatchObject({ curveId: "pattern-1", baseProgress: 0 });
    expect(body).toHaveProperty("particles.length", 10);
  });

  it("follows the recorded heart rate when bpm is omitted", async () => {
    expect(await (await fetch(`${baseUrl}/api/tracer/frame?now=0`)).json()).toMatchObject({
      bpm: 72,
      cycleSeconds: 60 / 72 * 4,
    });

    const recorded = await post("/api/tracer/heart-rate", { bpm: 120 });
    expect(await recorded.json()).toMatchObject({ current: 120, lastValid: 120 });

    expect(await (await fetch(`${baseUrl}/api/tracer/frame?now=0`)).json()).toMatchObject({ bpm: 120, cycleSeconds: 2 });
    expect(await (await fetch(`${baseUrl}/api/tracer/heart-rate`)).json()).toMatchObject({ current: 120 });
  });

  it("validates the query", async () => {
    const res = await fetch(`${baseUrl}/api/tracer/frame?bpm=fast`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Invalid request", issues: ["bpm: Expected number, received nan"] });
  });

  it("answers 404 for unknown curves", async () => {
    const res = await fetch(`${baseUrl}/api/tracer/frame?curve=nope`);
    expect(res.status).toBe(404);
  });
});

describe("stream", () => {
  it("pushes frames as server-sent events", async () => {
    const res = await fetch(`${baseUrl}/api/tracer/stream?pattern=4&bpm=60&count=2`);
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/event-stream");

    const reader = res.body?.getReader();
    if (!reader) throw new Error("stream has no body");
    const { value } = await reader.read();
    await reader.cancel();

    const text = new TextDecoder().decode(value);
    expect(text.startsWith("data: ")).toBe(true);
    const frame = JSON.parse(text.slice("data: ".length).split("\n\n")[0]);
    expect(frame).toMatchObject({ curveId: "pattern-4", bpm: 60, cycleSeconds: 4 });
    expect(frame.particles).toHaveLength(2);
  });

  it("stops the frame timer once the client disconnects", async () => {
    const setIntervalSpy = vi.spyOn(globalThis, "setInterval");
    const clearIntervalSpy = vi.spyOn(globalThis, "clearInterval");

    const res = await fetch(`${baseUrl}/api/tracer/stream?pattern=2&bpm=60`);
    const reader = res.body?.getReader();
    if (!reader) throw new Error("stream has no body");
    await reader.read();

    // TRACER_STREAM_FPS=50 in this suite
    const call = setIntervalSpy.mock.calls.findIndex((args) => args[1] === 20);
    expect(call).toBeGreaterThanOrEqual(0);
    const streamTimer = setIntervalSpy.mock.results[call].value;
    expect(clearIntervalSpy).not.toHaveBeenCalledWith(streamTimer);

    await reader.cancel();
    await vi.waitFor(() => expect(clearIntervalSpy).toHaveBeenCalledWith(streamTimer));
  });
});
