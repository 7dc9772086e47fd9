/**
 * Tests for the server launcher
 */

import { describe, it, expect, beforeEach, afterEach, jest } from "@jest/globals";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { startServer } from "../../src/server/startServer.js";
import { testConfig } from "../helpers/config.js";
import { JsonPageExtractor } from "../helpers/fakeExtractor.js";

describe("startServer", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "pdfdex-start-"));
    jest.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should listen on a free port and close the index on stop", async () => {
    const running = await startServer(testConfig(tempDir, { host: "127.0.0.1", port: 0 }), {
      extractor: new JsonPageExtractor(),
    });

    expect(running.server.port).toBeGreaterThan(0);
    expect(running.server.url).toBe(`http://127.0.0.1:${running.server.port}`);
    const res = await fetch(`${running.server.url}/health`);
    expect(await res.json()).toEqual({ status: "ok" });

    await running.stop();
    await running.stop();

    expect(running.service.isOpen).toBe(false);
  });

  it("should close the index when the port is taken", async () => {
    const first = await startServer(testConfig(tempDir, { host: "127.0.0.1", port: 0 }));
    try {
      await expect(
        startServer(testConfig(tempDir, { host: "127.0.0.1", port: first.server.port, dbPath: path.join(tempDir, "b.sqlite3") }))
      ).rejects.toMatchObject({ code: "EADDRINUSE" });
    } finally {
      await first.stop();
    }
  });
});
