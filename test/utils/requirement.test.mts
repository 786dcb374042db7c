import { expect, test } from "vitest";
import { canonicalizeName, formatRequirement, parseRequirement } from "../../src/utils/requirement.mts";

test("parses names, extras, specifiers and markers", () => {
  expect(parseRequirement('cudf[test] >=24.4, <24.6 ; python_version > "3.9"')).toEqual({
    name: "cudf",
    extras: "[test]",
    specifiers: [">=24.4", "<24.6"],
    marker: 'python_version > "3.9"'
  });
  expect(parseRequirement("rmm")).toEqual({ name: "rmm", extras: "", specifiers: [], marker: null });
});

test("returns null for strings that are not requirements", () => {
  expect(parseRequirement("--extra-index-url=https://pypi.example.com")).toBeNull();
  expect(parseRequirement("gcc_linux-64=11.*")).toBeNull();
});

test("formats requirements compactly", () => {
  const requirement = parseRequirement("cudf[test] >=24.4, <24.6 ; extra == 'x'");
  expect(requirement && formatRequirement(requirement)).toBe("cudf[test]>=24.4,<24.6; extra == 'x'");
});

test("canonicalizes package names", () => {
  expect(canonicalizeName("Dask_CUDA")).toBe("dask-cuda");
  expect(canonicalizeName("ucx.py")).toBe("ucx-py");
});
