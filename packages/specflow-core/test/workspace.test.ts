import assert from "node:assert/strict";
import os from "node:os";
import path from "node:path";
import { test } from "node:test";
import fs from "fs-extra";
import { listFeatureDirectories, resolveFallbackRoot } from "../src/workspace.js";

async function withTempRoot(fn: (root: string) => Promise<void>) {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "specflow-workspace-"));
  try {
    await fn(root);
  } finally {
    await fs.remove(root);
  }
}

test("resolveFallbackRoot finds the directory holding the project config", async () => {
  await withTempRoot(async root => {
    await fs.writeFile(path.join(root, "specflow.config.yaml"), "", "utf8");
    const nested = path.join(root, "src", "features");
    await fs.ensureDir(nested);
    assert.equal(await resolveFallbackRoot(nested), root);
  });
});

test("resolveFallbackRoot recognises the spec template as a marker", async () => {
  await withTempRoot(async root => {
    await fs.outputFile(path.join(root, "templates", "spec-template.md"), "# Spec\n");
    const nested = path.join(root, "docs");
    await fs.ensureDir(nested);
    assert.equal(await resolveFallbackRoot(nested), root);
  });
});

test("resolveFallbackRoot keeps the start directory without markers", async () => {
  await withTempRoot(async root => {
    const nested = path.join(root, "plain");
    await fs.ensureDir(nested);
    assert.equal(await resolveFallbackRoot(nested), nested);
  });
});

test("listFeatureDirectories returns sorted directory names only", async () => {
  await withTempRoot(async root => {
    await fs.ensureDir(path.join(root, "003-b"));
    await fs.ensureDir(path.join(root, "001-a"));
    await fs.writeFile(path.join(root, "README.md"), "notes", "utf8");
    await fs.ensureSymlink(path.join(root, "001-a"), path.join(root, "linked"), "dir");
    await fs.symlink(path.join(root, "missing"), path.join(root, "dangling"));
    assert.deepEqual(await listFeatureDirectories(root), ["001-a", "003-b", "linked"]);
  });
});

test("listFeatureDirectories treats a missing directory as empty", async () => {
  await withTempRoot(async root => {
    assert.deepEqual(await listFeatureDirectories(path.join(root, "specs")), []);
  });
});
