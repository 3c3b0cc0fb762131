import { describe, it, expect } from "vitest";
import { EventEmitter } from "node:events";
import type { CommandSpec } from "@tracking-bootstrap/types";
import { exitCodeForSignal, launchServer } from "../../src/process/launch";
import { LaunchError } from "../../src/errors";
import { createFakeSpawn } from "../../src/testing/fake-server-process";
import { CaptureLogger } from "../helpers/capture-logger";

const command: CommandSpec = {
  executable: "mlflow",
  args: ["server", "--host", "0.0.0.0", "--port", "5000", "--default-artifact-root", "s3://b"],
  backendStore: { kind: "local" },
};

describe("exitCodeForSignal", () => {
  it("follows the shell convention of 128 + signal number", () => {
    expect(exitCodeForSignal("SIGINT")).toBe(130);
    expect(exitCodeForSignal("SIGKILL")).toBe(137);
    expect(exitCodeForSignal("SIGTERM")).toBe(143);
  });
});

describe("launchServer", () => {
  it("spawns the executable in the foreground with inherited stdio", async () => {
    const { spawn, calls, child } = createFakeSpawn();
    const env = { BUCKET: "s3://b" };

    const running = launchServer(command, { spawn, env, signals: new EventEmitter() });
    child.start();
    child.exit(0);

    await expect(running).resolves.toEqual({ exitCode: 0, signal: null });
    expect(calls).toHaveLength(1);
    expect(calls[0]!.command).toBe("mlflow");
    expect(calls[0]!.args).toEqual(command.args);
    expect(calls[0]!.options).toEqual({ stdio: "inherit", env });
  });

  it("resolves with the server's non-zero exit code", async () => {
    const { spawn, child } = createFakeSpawn();

    const running = launchServer(command, { spawn, signals: new EventEmitter() });
    child.start();
    child.exit(2);

    await expect(running).resolves.toEqual({ exitCode: 2, signal: null });
  });

  it("maps a signal exit to 128 + signal number", async () => {
    const { spawn, child } = createFakeSpawn();

    const running = launchServer(command, { spawn, signals: new EventEmitter() });
    child.start();
    child.exit(null, "SIGTERM");

    await expect(running).resolves.toEqual({ exitCode: 143, signal: "SIGTERM" });
  });

  it("forwards termination signals to the server while it runs", async () => {
    const { spawn, child } = createFakeSpawn();
    const signals = new EventEmitter();
    const logger = new CaptureLogger();

    const running = launchServer(command, { spawn, signals, logger });
    child.start();
    signals.emit("SIGTERM", "SIGTERM");
    signals.emit("SIGINT", "SIGINT");
    child.exit(null, "SIGTERM");
    await running;

    expect(child.receivedSignals).toEqual(["SIGTERM", "SIGINT"]);
    expect(logger.messages("info")).toContain("forwarding signal to tracking server");
  });

  it("logs the server's pid as serverPid", async () => {
    const { spawn, child } = createFakeSpawn();
    const signals = new EventEmitter();
    const logger = new CaptureLogger();

    const running = launchServer(command, { spawn, signals, logger });
    child.start(4242);
    signals.emit("SIGTERM", "SIGTERM");
    child.exit(null, "SIGTERM");
    await running;

    const started = logger.records.find((r) => r.message === "tracking server started");
    const forwarded = logger.records.find((r) => r.message === "forwarding signal to tracking server");
    expect(started?.attributes).toEqual({ serverPid: 4242 });
    expect(forwarded?.attributes).toEqual({ signal: "SIGTERM", serverPid: 4242 });
  });

  it("stops listening for signals once the server has exited", async () => {
    const { spawn, child } = createFakeSpawn();
    const signals = new EventEmitter();

    const running = launchServer(command, { spawn, signals });
    expect(signals.listenerCount("SIGTERM")).toBe(1);
    expect(signals.listenerCount("SIGINT")).toBe(1);
    expect(signals.listenerCount("SIGHUP")).toBe(1);

    child.start();
    child.exit(0);
    await running;

    expect(signals.listenerCount("SIGTERM")).toBe(0);
    expect(signals.listenerCount("SIGINT")).toBe(0);
    expect(signals.listenerCount("SIGHUP")).toBe(0);
  });

  it("does not forward a signal to a server that already exited", async () => {
    const { spawn, child } = createFakeSpawn();
    const signals = new EventEmitter();

    const running = launchServer(command, { spawn, signals, forwardSignals: ["SIGTERM"] });
    child.start();
    child.exitCode = 0;
    signals.emit("SIGTERM", "SIGTERM");
    child.exit(0);
    await running;

    expect(child.receivedSignals).toEqual([]);
  });

  it("rejects with LaunchError when the executable cannot be started", async () => {
    const { spawn, child } = createFakeSpawn();
    const signals = new EventEmitter();

    const running = launchServer(command, { spawn, signals });
    child.failToStart(new Error("spawn mlflow ENOENT"));

    await expect(running).rejects.toThrow('Failed to start "mlflow": spawn mlflow ENOENT');
    await expect(running).rejects.toBeInstanceOf(LaunchError);
    expect(signals.listenerCount("SIGTERM")).toBe(0);
  });

  it("rejects with LaunchError when spawn throws", async () => {
    const running = launchServer(command, {
      spawn: () => {
        throw new TypeError("invalid argument");
      },
      signals: new EventEmitter(),
    });

    await expect(running).rejects.toThrow('Failed to start "mlflow": invalid argument');
  });

  it("logs process errors after the server has started without failing the launch", async () => {
    const { spawn, child } = createFakeSpawn();
    const logger = new CaptureLogger();

    const running = launchServer(command, { spawn, signals: new EventEmitter(), logger });
    child.start();
    child.failToStart(new Error("kill EPERM"));
    child.exit(0);

    await expect(running).resolves.toEqual({ exitCode: 0, signal: null });
    expect(logger.messages("warn")).toEqual(["tracking server process error"]);
  });
});
