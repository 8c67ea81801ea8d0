import { describe, expect, it } from "vitest";
import { ConfigError } from "../../errors.js";
import { loadEnv } from "../env.js";

describe("loadEnv", () => {
  it("falls back to the built-in defaults", () => {
    expect(loadEnv({})).toEqual({
      logLevel: "silent",
      defaults: {
        serverName: "localhost",
        serverPort: 80,
        remoteAddr: "127.0.0.1",
        remotePort: 80,
        localAddr: "127.0.0.1",
        localPort: 80,
        localHostname: "localhost"
      }
    });
  });

  it("reads overrides", () => {
    const env = loadEnv({
      REQUEST_FORGE_LOG_LEVEL: "DEBUG",
      REQUEST_FORGE_SERVER_NAME: "example.test",
      REQUEST_FORGE_SERVER_PORT: "8443",
      REQUEST_FORGE_REMOTE_ADDR: "10.1.2.3"
    });

    expect(env.logLevel).toBe("debug");
    expect(env.defaults).toMatchObject({ serverName: "example.test", serverPort: 8443, remoteAddr: "10.1.2.3" });
  });

  it("accepts an IPv6 remote address", () => {
    expect(loadEnv({ REQUEST_FORGE_REMOTE_ADDR: "::1" }).defaults.remoteAddr).toBe("::1");
  });

  it("rejects malformed values", () => {
    expect(() => loadEnv({ REQUEST_FORGE_LOG_LEVEL: "verbose" })).toThrow(ConfigError);
    expect(() => loadEnv({ REQUEST_FORGE_SERVER_PORT: "0" })).toThrow("REQUEST_FORGE_SERVER_PORT must be a positive integer");
    expect(() => loadEnv({ REQUEST_FORGE_SERVER_PORT: "80.5" })).toThrow(ConfigError);
    expect(() => loadEnv({ REQUEST_FORGE_REMOTE_ADDR: "localhost" })).toThrow("REQUEST_FORGE_REMOTE_ADDR must be an IPv4 or IPv6 address");
  });
});
