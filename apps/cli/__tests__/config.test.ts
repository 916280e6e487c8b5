import { describe, it, expect } from "vitest";
import { ConfigError } from "@otactl/sdk";
import { resolveClientConfig } from "../src/config.js";
import { getDefaultSocketPath } from "../src/transport/platform.js";

describe("resolveClientConfig", () => {
  it("uses the defaults when nothing is set", () => {
    expect(resolveClientConfig({})).toEqual({
      socketPath: getDefaultSocketPath(),
      callTimeoutMs: 0,
    });
  });

  it("reads the socket path and timeout from the environment", () => {
    const config = resolveClientConfig({
      UPDATE_ENGINE_SOCKET: "/tmp/ue.sock",
      UPDATE_ENGINE_CALL_TIMEOUT_MS: "2500",
    });

    expect(config).toEqual({ socketPath: "/tmp/ue.sock", callTimeoutMs: 2500 });
  });

  it("rejects an empty socket path", () => {
    expect(() => resolveClientConfig({ UPDATE_ENGINE_SOCKET: "" })).toThrow(
      "Invalid configuration: socketPath: Socket path must not be empty",
    );
  });

  it("rejects a negative timeout", () => {
    expect(() => resolveClientConfig({ UPDATE_ENGINE_CALL_TIMEOUT_MS: "-5" })).toThrow(ConfigError);
  });

  it("rejects a timeout that is not a number", () => {
    expect(() => resolveClientConfig({ UPDATE_ENGINE_CALL_TIMEOUT_MS: "soon" })).toThrow(
      "Invalid configuration: callTimeoutMs: Expected number, received nan",
    );
  });
});

describe("getDefaultSocketPath", () => {
  it("uses the update engine socket on Unix", () => {
    expect(getDefaultSocketPath(false)).toBe("/run/update_engine/update_engine.sock");
  });

  it("uses a named pipe on Windows", () => {
    expect(getDefaultSocketPath(true)).toBe("\\\\.\\pipe\\update_engine");
  });
});
