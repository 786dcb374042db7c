import path from "node:path";
import { afterEach, expect, test } from "vitest";
import {
  ALPHA_SPEC_CHECK_NAME,
  type AlphaSpecOptions,
  createAlphaSpecCheck,
  getRapidsVersion,
  stripCudaSuffix
} from "../../src/checks/alpha-spec.mts";
import { ConfigurationError, SourceParseError } from "../../src/errors.mts";
import { Linter } from "../../src/linter.mts";
import { MetadataCache } from "../../src/utils/metadata.mts";
import { cleanupTempDir, createTempDir, writeText } from "../helpers.mts";

const DEPENDENCIES = `dependencies:
  build:
    common:
      - output_types: [conda, pyproject]
        packages:
          - cudf==24.8.*
          - "rmm>=24.8"
          - numpy
    specific:
      - output_types: conda
        matrices:
          - matrix: {cuda: "12.*"}
            packages:
              - cudf-cu12==24.8.*,>=0.0.0a0
              - dask-cuda
`;

const tempDirs: string[] = [];

afterEach(() => {
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) {
      cleanupTempDir(dir);
    }
  }
});

function options(mode: AlphaSpecOptions["mode"], rapidsVersion = "24.08"): AlphaSpecOptions {
  return { fix: false, files: [], mode, rapidsVersion, rapidsVersionFile: "VERSION" };
}

function lint(content: string, mode: AlphaSpecOptions["mode"], rapidsVersion?: string): Linter {
  const linter = new Linter("dependencies.yaml", content, ALPHA_SPEC_CHECK_NAME);
  createAlphaSpecCheck(new MetadataCache())(linter, options(mode, rapidsVersion));
  return linter;
}

test("development mode adds the alpha spec to RAPIDS packages", () => {
  const linter = lint(DEPENDENCIES, "development");

  expect(linter.warnings.map((warning) => warning.msg)).toEqual([
    "add alpha spec for RAPIDS package cudf",
    "add alpha spec for RAPIDS package rmm",
    "add alpha spec for RAPIDS package dask-cuda"
  ]);
  const cudf = DEPENDENCIES.indexOf("cudf==24.8.*");
  expect(linter.warnings[0].pos).toEqual([cudf, cudf + "cudf==24.8.*".length]);
  expect(linter.fix()).toBe(
    DEPENDENCIES.replace("- cudf==24.8.*\n", "- cudf==24.8.*,>=0.0.0a0\n")
      .replace('"rmm>=24.8"', '"rmm>=24.8,>=0.0.0a0"')
      .replace("- dask-cuda", "- dask-cuda>=0.0.0a0")
  );
});

test("release mode removes the alpha spec", () => {
  const linter = lint(DEPENDENCIES, "release");

  expect(linter.warnings.map((warning) => warning.msg)).toEqual([
    "remove alpha spec for RAPIDS package cudf-cu12"
  ]);
  expect(linter.fix()).toBe(DEPENDENCIES.replace("cudf-cu12==24.8.*,>=0.0.0a0", "cudf-cu12==24.8.*"));
});

test("keeps single quotes around fixed requirements", () => {
  const content = "dependencies:\n  run:\n    common:\n      - packages:\n          - 'rmm'\n";
  expect(lint(content, "development").fix()).toBe(content.replace("'rmm'", "'rmm>=0.0.0a0'"));
});

test("ignores entries that are not requirements", () => {
  const content =
    "dependencies:\n  run:\n    common:\n      - packages:\n          - --extra-index-url=https://pypi.example.com\n          - gcc_linux-64=11.*\n";
  expect(lint(content, "development").warnings).toEqual([]);
});

test("rejects malformed YAML", () => {
  expect(() => lint("dependencies: [unclosed\n", "development")).toThrow(SourceParseError);
});

test("strips CUDA suffixes only from CUDA-suffixed packages", () => {
  const suffixed = new Set(["cudf"]);
  expect(stripCudaSuffix("cudf-cu12", suffixed)).toBe("cudf");
  expect(stripCudaSuffix("dask-cuda", suffixed)).toBe("dask-cuda");
  expect(stripCudaSuffix("other-cu11", suffixed)).toBe("other-cu11");
});

test("checks against newer releases", () => {
  const linter = lint(DEPENDENCIES, "development", "26.02");
  expect(linter.warnings.map((warning) => warning.msg)).toEqual([
    "add alpha spec for RAPIDS package cudf",
    "add alpha spec for RAPIDS package rmm",
    "add alpha spec for RAPIDS package dask-cuda"
  ]);
});

test("reads the RAPIDS version from the version file", () => {
  const dir = createTempDir();
  tempDirs.push(dir);
  const versionFile = path.join(dir, "VERSION");
  writeText(versionFile, "24.06.00\n");

  const metadata = new MetadataCache();
  const version = getRapidsVersion({ rapidsVersionFile: versionFile }, metadata);
  expect(version).toBe(metadata.version("24.06"));
  expect(() => getRapidsVersion({ rapidsVersion: "99.01", rapidsVersionFile: versionFile }, metadata)).toThrow(
    "no release metadata for version 99.01"
  );
  expect(() => getRapidsVersion({ rapidsVersionFile: path.join(dir, "MISSING") }, metadata)).toThrow(
    ConfigurationError
  );
});
