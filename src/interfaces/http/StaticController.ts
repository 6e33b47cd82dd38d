/**
 * Static asset controller.
 *
 * Serves files below the configured asset root. Every request path is
 * decoded, resolved lexically and then canonicalized through the filesystem
 * (symlinks followed); both results must stay inside the root.
 */
import fs from "fs";
import path from "path";

import { ForbiddenError, NotFoundError } from "@middleware/errorHandler";
import { Request, Response, NextFunction, RequestHandler } from "express";

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".js": "application/javascript; charset=utf-8",
};

const DEFAULT_CONTENT_TYPE = "text/plain; charset=utf-8";

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath)] ?? DEFAULT_CONTENT_TYPE;
}

export function isWithin(root: string, target: string): boolean {
  if (target === root) {
    return true;
  }
  const prefix = root.endsWith(path.sep) ? root : root + path.sep;
  return target.startsWith(prefix);
}

function decodeRequestPath(requestPath: string): string {
  let decoded: string;
  try {
    decoded = decodeURIComponent(requestPath);
  } catch {
    throw new NotFoundError("Not Found", { path: requestPath });
  }

  if (decoded.includes("\0")) {
    throw new NotFoundError("Not Found", { path: requestPath });
  }

  const relative = decoded.replace(/^\/+/, "");
  return relative === "" ? "index.html" : relative;
}

async function canonicalize(target: string): Promise<string> {
  try {
    return await fs.promises.realpath(target);
  } catch (err: unknown) {
    const code =
      err instanceof Error && "code" in err ? String(err.code) : undefined;
    if (code === "ENOENT" || code === "ENOTDIR") {
      throw new NotFoundError("Not Found", { path: target });
    }
    throw err;
  }
}

/**
 * Maps a request path to a readable file under `assetRoot`.
 *
 * Throws ForbiddenError when the path leaves the root (lexically or through
 * a symlink) and NotFoundError when nothing servable exists there.
 */
export async function resolveAssetPath(
  assetRoot: string,
  requestPath: string
): Promise<string> {
  const root = path.resolve(assetRoot);
  const candidate = path.resolve(root, decodeRequestPath(requestPath));

  if (!isWithin(root, candidate)) {
    throw new ForbiddenError("Forbidden", { path: requestPath });
  }

  const realRoot = await canonicalize(root);
  const realCandidate = await canonicalize(candidate);

  if (!isWithin(realRoot, realCandidate)) {
    throw new ForbiddenError("Forbidden", { path: requestPath });
  }

  const stats = await fs.promises.stat(realCandidate);
  if (!stats.isFile()) {
    throw new NotFoundError("Not Found", { path: requestPath });
  }

  return realCandidate;
}

export function createStaticController(assetRoot: string): RequestHandler {
  return async function staticController(
    req: Request,
    res: Response,
    next: NextFunction
  ): Promise<void> {
    try {
      const filePath = await resolveAssetPath(assetRoot, req.path);
      const body = await fs.promises.readFile(filePath);

      res.status(200);
      res.setHeader("Content-Type", contentTypeFor(filePath));
      res.send(body);
    } catch (err: unknown) {
      next(err);
    }
  };
}
