/**
 * Tests for loadConfig.
 */

import { describe, it, expect } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadConfig({});
    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.ADDRESS_DERIVATION).toBe("program");
    expect(config.BRIDGE_PROGRAM_ID).toEqual(new Uint8Array(32).fill(0x11));
    expect(config.BRIDGE_ADMIN_SEED).toEqual(new Uint8Array(32).fill(0x22));
    expect(config.COMMISSION_PROGRAM_ID).toEqual(new Uint8Array(32).fill(0x33));
    expect(config.AUTHORITY_PUBLIC_KEY).toBeUndefined();
  });

  it("reads server settings", () => {
    const config = loadConfig({
      PORT: "8080",
      HOST: "127.0.0.1",
      LOG_LEVEL: "debug",
      NODE_ENV: "production",
    });
    expect(config.PORT).toBe(8080);
    expect(config.HOST).toBe("127.0.0.1");
    expect(config.LOG_LEVEL).toBe("debug");
    expect(config.NODE_ENV).toBe("production");
  });

  it("decodes hex settings with or without a prefix", () => {
    const config = loadConfig({
      BRIDGE_PROGRAM_ID: "0x" + "ab".repeat(32),
      AUTHORITY_PUBLIC_KEY: "cd".repeat(64),
    });
    expect(config.BRIDGE_PROGRAM_ID).toEqual(new Uint8Array(32).fill(0xab));
    expect(config.AUTHORITY_PUBLIC_KEY).toEqual(new Uint8Array(64).fill(0xcd));
  });

  it("rejects hex of the wrong length", () => {
    expect(() => loadConfig({ BRIDGE_ADMIN_SEED: "ab".repeat(31) })).toThrow(
      "Expected 32 bytes of hex",
    );
    expect(() => loadConfig({ AUTHORITY_PUBLIC_KEY: "ab".repeat(32) })).toThrow(
      "Expected 64 bytes of hex",
    );
  });

  it("rejects non-hex characters", () => {
    expect(() => loadConfig({ COMMISSION_PROGRAM_ID: "zz".repeat(32) })).toThrow();
  });

  it("throws on invalid PORT", () => {
    expect(() => loadConfig({ PORT: "0" })).toThrow();
    expect(() => loadConfig({ PORT: "99999" })).toThrow();
  });

  it("rejects an unknown address derivation", () => {
    expect(() => loadConfig({ ADDRESS_DERIVATION: "sha256" })).toThrow();
  });
});
