import fs from "fs";
import os from "os";
import path from "path";

import { ForbiddenError, NotFoundError } from "@middleware/errorHandler";
import { afterAll, beforeAll, describe, it, expect } from "vitest";

import { contentTypeFor, isWithin, resolveAssetPath } from "./StaticController";

let sandbox: string;
let assetRoot: string;

beforeAll(() => {
  sandbox = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "searchlight-static-")));
  assetRoot = path.join(sandbox, "public");
  fs.mkdirSync(path.join(assetRoot, "nested"), { recursive: true });
  fs.writeFileSync(path.join(assetRoot, "index.html"), "<h1>home</h1>");
  fs.writeFileSync(path.join(assetRoot, "nested", "deep.txt"), "deep");
  fs.writeFileSync(path.join(sandbox, "secret.txt"), "secret");
  fs.symlinkSync(path.join(sandbox, "secret.txt"), path.join(assetRoot, "leak.txt"));
  fs.symlinkSync(path.join(assetRoot, "index.html"), path.join(assetRoot, "alias.html"));
});

afterAll(() => {
  fs.rmSync(sandbox, { recursive: true, force: true });
});

describe("contentTypeFor", () => {
  it.each([
    ["index.html", "text/html; charset=utf-8"],
    ["styles.css", "text/css; charset=utf-8"],
    ["app.js", "application/javascript; charset=utf-8"],
    ["notes.md", "text/plain; charset=utf-8"],
    ["LICENSE", "text/plain; charset=utf-8"],
  ])("maps %s to %s", (file, expected) => {
    expect(contentTypeFor(file)).toBe(expected);
  });
});

describe("isWithin", () => {
  it("accepts the root itself and its descendants", () => {
    expect(isWithin("/srv/public", "/srv/public")).toBe(true);
    expect(isWithin("/srv/public", "/srv/public/a/b.css")).toBe(true);
  });

  it("rejects siblings that share a name prefix", () => {
    expect(isWithin("/srv/public", "/srv/public-evil/x")).toBe(false);
    expect(isWithin("/srv/public", "/srv")).toBe(false);
  });
});

describe("resolveAssetPath", () => {
  it("maps / to index.html", async () => {
    await expect(resolveAssetPath(assetRoot, "/")).resolves.toBe(
      path.join(assetRoot, "index.html")
    );
  });

  it("resolves nested files and percent-encoded names", async () => {
    await expect(resolveAssetPath(assetRoot, "/nested/deep.txt")).resolves.toBe(
      path.join(assetRoot, "nested", "deep.txt")
    );
    await expect(resolveAssetPath(assetRoot, "/nested%2Fdeep.txt")).resolves.toBe(
      path.join(assetRoot, "nested", "deep.txt")
    );
  });

  it("follows symlinks that stay inside the root", async () => {
    await expect(resolveAssetPath(assetRoot, "/alias.html")).resolves.toBe(
      path.join(assetRoot, "index.html")
    );
  });

  it("forbids relative-path escapes", async () => {
    await expect(resolveAssetPath(assetRoot, "/../secret.txt")).rejects.toBeInstanceOf(
      ForbiddenError
    );
    await expect(
      resolveAssetPath(assetRoot, "/nested/..%2F..%2Fsecret.txt")
    ).rejects.toBeInstanceOf(ForbiddenError);
  });

  it("forbids symlinks that leave the root", async () => {
    await expect(resolveAssetPath(assetRoot, "/leak.txt")).rejects.toBeInstanceOf(
      ForbiddenError
    );
  });

  it("reports missing files and directories as not found", async () => {
    await expect(resolveAssetPath(assetRoot, "/missing.css")).rejects.toBeInstanceOf(
      NotFoundError
    );
    await expect(resolveAssetPath(assetRoot, "/nested")).rejects.toBeInstanceOf(
      NotFoundError
    );
    await expect(
      resolveAssetPath(assetRoot, "/index.html/child")
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("reports undecodable paths and NUL bytes as not found", async () => {
    await expect(resolveAssetPath(assetRoot, "/%E0%A4%A")).rejects.toBeInstanceOf(
      NotFoundError
    );
    await expect(resolveAssetPath(assetRoot, "/index%00.html")).rejects.toBeInstanceOf(
      NotFoundError
    );
  });

  it("reports a missing asset root as not found", async () => {
    await expect(
      resolveAssetPath(path.join(sandbox, "does-not-exist"), "/index.html")
    ).rejects.toBeInstanceOf(NotFoundError);
  });
});
