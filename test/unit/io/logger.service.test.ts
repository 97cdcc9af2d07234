import { describe, it, expect, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { LoggerService } from "../../../src/io/logger.service";

const loggerService = new LoggerService();
let tmpDir: string | undefined;

afterEach(async () => {
  loggerService.reset();
  if (tmpDir) {
    await fs.rm(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  }
});

describe("LoggerService", () => {
  it("writes logs to a configured file destination", async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "switchboard-logs-"));
    const logPath = path.join(tmpDir, "nested", "switchboard.log");

    loggerService.configure({
      level: "info",
      destination: { type: "file", path: logPath },
    });
    loggerService.getLogger("sessions").info({ sessionId: "abc" }, "file logging works");

    await new Promise((resolve) => setTimeout(resolve, 50));

    const [line] = (await fs.readFile(logPath, "utf-8")).trim().split("\n");
    expect(JSON.parse(line)).toMatchObject({
      level: 30,
      scope: "sessions",
      sessionId: "abc",
      msg: "file logging works",
    });
  });

  it("returns scoped child loggers", () => {
    loggerService.configure({ level: "info" });
    const child = loggerService.getLogger("orchestrator").child({ sessionId: "123" });

    expect(child.bindings()).toMatchObject({ scope: "orchestrator", sessionId: "123" });
  });

  it("binds the session and agent for executor loggers", () => {
    loggerService.configure({ level: "info" });

    expect(loggerService.forAgent("session-1", "main").bindings()).toEqual({
      scope: "agent-executor",
      sessionId: "session-1",
      agent: "main",
    });
  });

  it("applies the configured level and rebuilds the root on reconfiguration", () => {
    const first = loggerService.configure({ level: "warn" });
    const second = loggerService.configure({ level: "silent" });

    expect(first.level).toBe("warn");
    expect(second).not.toBe(first);
    expect(loggerService.getLogger()).toBe(second);
    expect(loggerService.getLogger("sessions").level).toBe("silent");
  });

  it("creates an info logger when used before configuration", () => {
    expect(loggerService.getLogger().level).toBe("info");
  });
});
