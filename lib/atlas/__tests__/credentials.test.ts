import { describe, it, expect, beforeEach, afterEach } from "@jest/globals";
import fs from "fs";
import os from "os";
import path from "path";
import { AtlasConfigError } from "../../env";
import { AtlasClient } from "../client";
import { createAtlasClient, resolveRefreshToken } from "../credentials";

describe("resolveRefreshToken()", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "atlas-credentials-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function envFile(name: string, contents: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, contents);
    return file;
  }

  it("prefers an explicit token", () => {
    expect(
      resolveRefreshToken({
        refreshToken: "  explicit-token ",
        env: { ATLAS_REFRESH_TOKEN: "env-token" },
      }),
    ).toBe("explicit-token");
  });

  it("falls back to the environment", () => {
    expect(
      resolveRefreshToken({
        env: { ATLAS_REFRESH_TOKEN: "env-token" },
        envFiles: [],
      }),
    ).toBe("env-token");
  });

  it("reads the first env file that has a token", () => {
    const local = envFile(".env.local", "# nothing here\nOTHER=1\n");
    const shared = envFile(".env", "ATLAS_REFRESH_TOKEN=file-token\n");

    expect(
      resolveRefreshToken({
        env: {},
        envFiles: [path.join(dir, "missing.env"), local, shared],
      }),
    ).toBe("file-token");
  });

  it("throws AtlasConfigError when no token is found", () => {
    expect(() => resolveRefreshToken({ env: {}, envFiles: [] })).toThrow(
      AtlasConfigError,
    );
  });
});

describe("createAtlasClient()", () => {
  it("builds a client from the environment", () => {
    const client = createAtlasClient({
      env: { ATLAS_REFRESH_TOKEN: "test-secret" },
      envFiles: [],
    });
    expect(client).toBeInstanceOf(AtlasClient);
  });
});
