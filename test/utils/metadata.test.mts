import path from "node:path";
import { afterEach, expect, test } from "vitest";
import { ConfigurationError } from "../../src/errors.mts";
import {
  MetadataCache,
  cudaSuffixedPackages,
  parseMetadata,
  prereleasePackages
} from "../../src/utils/metadata.mts";
import { cleanupTempDir, createTempDir, writeText } from "../helpers.mts";

const tempDirs: string[] = [];

afterEach(() => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) {
      cleanupTempDir(dir);
    }
  }
});

test("splits packages by prerelease and CUDA suffix", () => {
  const versions = parseMetadata({
    versions: {
      "1.0": {
        packages: {
          alpha: { prerelease: true, cudaSuffixed: true },
          beta: { prerelease: true },
          gamma: {}
        }
      }
    }
  });
  const version = versions.get("1.0");
  expect(version && [...prereleasePackages(version)]).toEqual(["alpha", "beta"]);
  expect(version && [...cudaSuffixedPackages(version)]).toEqual(["alpha"]);
});

test("rejects malformed metadata", () => {
  expect(() => parseMetadata([])).toThrow("invalid release metadata: expected a versions table");
  expect(() => parseMetadata({ versions: { "1.0": {} } })).toThrow("invalid release metadata for version 1.0");
  expect(() => parseMetadata({ versions: { "1.0": { packages: { a: 1 } } } })).toThrow(
    "invalid metadata for package a"
  );
});

test("loads the bundled metadata once", () => {
  const cache = new MetadataCache();
  expect(cache.all()).toBe(cache.all());
  expect(prereleasePackages(cache.version("24.08")).has("cudf-polars")).toBe(true);
  expect(prereleasePackages(cache.version("24.06")).has("cudf-polars")).toBe(false);
  expect(() => cache.version("1.0")).toThrow("no release metadata for version 1.0");
});

test("reports unreadable metadata files", () => {
  const dir = createTempDir();
  tempDirs.push(dir);
  const broken = path.join(dir, "metadata.json");
  writeText(broken, "{ not json");

  expect(() => new MetadataCache(broken).all()).toThrow(ConfigurationError);
  expect(() => new MetadataCache(path.join(dir, "missing.json")).all()).toThrow("cannot read release metadata");
});

test("bundles every release from 23.02 to 26.12", () => {
  const versions = [...new MetadataCache().all().keys()];
  expect(versions[0]).toBe("23.02");
  expect(versions.at(-1)).toBe("26.12");
  expect(versions).toHaveLength(24);
  expect(cudaSuffixedPackages(new MetadataCache().version("26.02")).has("cudf")).toBe(true);
});
