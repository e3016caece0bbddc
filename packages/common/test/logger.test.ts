import { Hono } from "hono";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLogger, errorMessage } from "../src/logger.ts";
import { getRequestId, requestIdMiddleware, withRequestId } from "../src/request-id.ts";

// Capture stdout writes for assertions
function captureStdout() {
  const lines: string[] = [];
  const original = process.stdout.write;
  process.stdout.write = ((chunk: string) => {
    lines.push(chunk);
    return true;
  }) as typeof process.stdout.write;
  return {
    lines,
    restore() {
      process.stdout.write = original;
    },
  };
}

describe("createLogger", () => {
  let capture: ReturnType<typeof captureStdout>;

  beforeEach(() => {
    capture = captureStdout();
  });

  afterEach(() => {
    capture.restore();
  });

  it("writes valid JSON with correct fields", () => {
    const log = createLogger("parcelwatch");
    log.info("hello");

    expect(capture.lines.length).toBe(1);
    const parsed = JSON.parse(capture.lines[0]);
    expect(parsed.level).toBe("info");
    expect(parsed.service).toBe("parcelwatch");
    expect(parsed.msg).toBe("hello");
    expect(parsed.request_id).toBeNull();
    expect(parsed.ts).toMatch(/^\d{4}-\d{2}-\d{2}T/);
  });

  it("includes extra fields", () => {
    const log = createLogger("parcelwatch");
    log.info("with extras", { tracking_number: "RR123456789CN", count: 42 });

    const parsed = JSON.parse(capture.lines[0]);
    expect(parsed.tracking_number).toBe("RR123456789CN");
    expect(parsed.count).toBe(42);
  });

  it("defaults to info and suppresses debug", () => {
    const log = createLogger("parcelwatch");
    log.debug("d");
    log.info("i");

    expect(capture.lines.length).toBe(1);
    expect(JSON.parse(capture.lines[0]).level).toBe("info");
  });

  it("respects level=error", () => {
    const log = createLogger("parcelwatch", { level: "error" });

    log.debug("d");
    log.info("i");
    log.warn("w");
    log.error("e");

    expect(capture.lines.length).toBe(1);
    expect(JSON.parse(capture.lines[0]).level).toBe("error");
  });

  it("child() merges extra fields and keeps the level", () => {
    const log = createLogger("parcelwatch", { level: "warn" });
    const child = log.child({ module: "poller" });

    child.info("dropped");
    child.warn("scoped");

    expect(capture.lines.length).toBe(1);
    const parsed = JSON.parse(capture.lines[0]);
    expect(parsed.module).toBe("poller");
    expect(parsed.service).toBe("parcelwatch");
    expect(parsed.msg).toBe("scoped");
  });

  it("child() call-site extra overrides base extra", () => {
    const log = createLogger("parcelwatch");
    const child = log.child({ module: "poller", k: 1 });

    child.info("override", { k: 2 });

    expect(JSON.parse(capture.lines[0]).k).toBe(2);
  });
});

describe("errorMessage", () => {
  it("uses Error.message and stringifies anything else", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage("plain")).toBe("plain");
    expect(errorMessage(42)).toBe("42");
  });
});

describe("request ids", () => {
  it("getRequestId returns null outside a scope", () => {
    expect(getRequestId()).toBeNull();
  });

  it("withRequestId exposes the id to awaited work", async () => {
    const seen = await withRequestId("cycle-1", async () => {
      await Promise.resolve();
      return getRequestId();
    });
    expect(seen).toBe("cycle-1");
    expect(getRequestId()).toBeNull();
  });
});

describe("requestIdMiddleware", () => {
  it("generates a request ID and sets it on context and response header", async () => {
    const app = new Hono();
    app.use("*", requestIdMiddleware());
    app.get("/", (c) => c.json({ id: c.get("requestId") }));

    const res = await app.request("/");
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(typeof body.id).toBe("string");
    expect(body.id.length).toBe(12);
    expect(res.headers.get("x-request-id")).toBe(body.id);
  });

  it("reuses X-Request-Id from incoming request header", async () => {
    const app = new Hono();
    app.use("*", requestIdMiddleware());
    app.get("/", (c) => c.json({ id: c.get("requestId") }));

    const res = await app.request("/", {
      headers: { "X-Request-Id": "my-trace-123" },
    });

    const body = await res.json();
    expect(body.id).toBe("my-trace-123");
    expect(res.headers.get("x-request-id")).toBe("my-trace-123");
  });

  it("makes request_id available to logger via AsyncLocalStorage", async () => {
    const log = createLogger("parcelwatch");
    const lines: string[] = [];

    const app = new Hono();
    app.use("*", requestIdMiddleware());
    app.get("/", (c) => {
      const capture = captureStdout();
      log.info("inside handler");
      capture.restore();
      lines.push(...capture.lines);
      return c.json({ ok: true });
    });

    await app.request("/", { headers: { "X-Request-Id": "req-abc" } });

    expect(JSON.parse(lines[0]).request_id).toBe("req-abc");
  });
});
