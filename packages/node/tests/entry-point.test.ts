/**
 * Tests for the root start script.
 */

import { describe, it, expect } from "vitest";
import { existsSync, readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const root = new URL("../../../", import.meta.url);

const ManifestSchema = z.object({
  scripts: z.object({ start: z.string() }),
  devDependencies: z.record(z.string()),
});

const WorkspaceSchema = z.object({
  exports: z.object({ ".": z.string() }),
});

function readManifest(path: string): unknown {
  return JSON.parse(readFileSync(new URL(path, root), "utf8"));
}

describe("start script", () => {
  const manifest = ManifestSchema.parse(readManifest("package.json"));

  it("runs the TypeScript entry through a loader", () => {
    const [runner, entry] = manifest.scripts.start.split(" ");

    expect(runner).toBe("tsx");
    expect(manifest.devDependencies).toHaveProperty("tsx");
    expect(entry).toBe("packages/node/src/main.ts");
    expect(existsSync(fileURLToPath(new URL(entry ?? "", root)))).toBe(true);
  });

  it("matches workspaces that export their TypeScript sources", () => {
    for (const name of ["types", "ledger", "event-store", "treasury", "vault", "node"]) {
      const workspace = WorkspaceSchema.parse(readManifest(`packages/${name}/package.json`));
      expect(workspace.exports["."]).toBe("./src/index.ts");
    }
  });
});
