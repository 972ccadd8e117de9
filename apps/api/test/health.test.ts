import { describe, expect, it, vi } from "vitest";
import { createTestApp } from "./helpers";

describe("health routes", () => {
  it("returns basic health status", async () => {
    const { app } = createTestApp();

    const response = await app.request("/health");
    expect(response.status).toBe(200);

    expect(await response.json()).toMatchObject({
      status: "ok",
      timestamp: expect.any(String),
    });
  });

  it("is ready when the job store answers", async () => {
    const { app } = createTestApp();

    const response = await app.request("/health/ready");
    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: "ok", services: { store: "ok" } });
  });

  it("reports degraded when the job store is down", async () => {
    const { app, orchestrator } = createTestApp();
    vi.spyOn(orchestrator, "ping").mockRejectedValue(new Error("connection refused"));

    const response = await app.request("/health/ready");
    expect(response.status).toBe(503);
    expect(await response.json()).toMatchObject({
      status: "degraded",
      services: { store: "error" },
      errors: { store: "connection refused" },
    });
  });
});
