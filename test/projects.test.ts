import { describe, expect, it } from "vitest";
import { excludeProjectPaths, expandProjectPaths } from "../src/core/projects.js";

describe("expandProjectPaths", () => {
  it("prefixes bare names with the group", () => {
    expect(expandProjectPaths(["api", "other/web"], "team")).toEqual(["team/api", "other/web"]);
  });

  it("tolerates a trailing slash on the group", () => {
    expect(expandProjectPaths(["api"], "team/sub/")).toEqual(["team/sub/api"]);
  });

  it("leaves names untouched without a group", () => {
    expect(expandProjectPaths(["api"], undefined)).toEqual(["api"]);
    expect(expandProjectPaths(["api"], "  ")).toEqual(["api"]);
  });
});

describe("excludeProjectPaths", () => {
  it("drops paths matching any pattern", () => {
    const paths = ["team/api", "team/legacy-web", "team/legacy-cron", "ops/infra"];
    expect(excludeProjectPaths(paths, ["team/legacy-*", "ops/*"])).toEqual(["team/api"]);
  });

  it("does not let a single star cross a slash", () => {
    expect(excludeProjectPaths(["team/sub/api"], ["team/*"])).toEqual(["team/sub/api"]);
  });

  it("keeps everything without patterns", () => {
    expect(excludeProjectPaths(["a/b"], [])).toEqual(["a/b"]);
  });
});
