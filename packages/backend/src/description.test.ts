/**
 * Tests for applying package descriptions
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { applyDescription, generateFromDescription } from "./description.js";
import { createConfiguration } from "./configuration.js";
import { formatCMakeList } from "./cmake-syntax.js";
import type { PackageDescription } from "./types.js";

describe("Description", () => {
  describe("formatCMakeList", () => {
    it("should join plain items with spaces", () => {
      expect(formatCMakeList(["src/a.c", "src/b.c"])).to.equal(
        "src/a.c src/b.c"
      );
    });

    it("should quote items CMake would split or expand", () => {
      expect(formatCMakeList(["My Dir", 'V="1"', "", "a;b"])).to.equal(
        '"My Dir" "V=\\"1\\"" "" "a;b"'
      );
    });
  });

  describe("applyDescription", () => {
    it("should record platforms, variables and module wiring", () => {
      const description: PackageDescription = {
        package: "foo",
        supportedPlatforms: ["unix", "windows"],
        unsupportedPlatforms: ["cygwin"],
        variables: { LUA_VERSION: "5.1", FLAGS: ["-O2", "-g"] },
        scriptModules: [{ name: "foo", sources: ["src/foo.lua"] }],
        nativeModules: [
          {
            name: "foo.core",
            sources: ["src/core.c", "src/util.c"],
            libraries: ["m"],
            defines: ["FOO_CORE=1"],
          },
        ],
        install: { bin: ["bin/foo"] },
        copyDirectories: ["doc"],
      };
      const state = createConfiguration(description.package);

      applyDescription(state, description);

      expect(state.errors).to.deep.equal([]);
      expect(state.supportedPlatforms).to.deep.equal(["unix", "windows"]);
      expect(state.unsupportedPlatforms).to.deep.equal(["cygwin"]);
      expect([...state.variables]).to.deep.equal([
        ["LUA_VERSION", "5.1"],
        ["FLAGS", "-O2 -g"],
        ["BUILD_INSTALL_BIN", "bin/foo"],
        ["foo_SOURCES", "src/foo.lua"],
        ["foo.core_SOURCES", "src/core.c src/util.c"],
        ["foo.core_LIBRARIES", "m"],
        ["foo.core_DEFINES", "FOO_CORE=1"],
        ["BUILD_COPY_DIRECTORIES", "doc"],
      ]);
      expect(state.scriptTargets).to.deep.equal(["foo"]);
      expect(state.nativeTargets).to.deep.equal(["foo.core"]);
    });

    it("should write a string variable as a single quoted argument", () => {
      const state = createConfiguration("foo");

      applyDescription(state, {
        package: "foo",
        variables: {
          FLAGS: "-DX #1",
          PREFIX: "My Dir",
          PLAIN: "5.10",
          EMPTY: "",
        },
      });

      expect([...state.variables]).to.deep.equal([
        ["FLAGS", '"-DX #1"'],
        ["PREFIX", '"My Dir"'],
        ["PLAIN", "5.10"],
        ["EMPTY", '""'],
      ]);
    });

    it("should apply platform overrides in their own scope", () => {
      const state = createConfiguration("foo");

      applyDescription(state, {
        package: "foo",
        platforms: {
          windows: {
            variables: { CFLAGS: "/O2" },
            nativeModules: [
              { name: "foo.win", sources: ["src/win.c"], libraries: ["ws2_32"] },
            ],
          },
        },
      });

      expect(state.variables.size).to.equal(0);
      expect([...(state.platformVariables.get("windows") ?? [])]).to.deep.equal(
        [
          ["CFLAGS", "/O2"],
          ["foo.win_SOURCES", "src/win.c"],
          ["foo.win_LIBRARIES", "ws2_32"],
        ]
      );
      expect(state.platformNativeTargets.get("windows")).to.deep.equal([
        "foo.win",
      ]);
    });

    it("should record an error for each setter given an unknown platform", () => {
      const state = createConfiguration("foo");

      applyDescription(state, {
        package: "foo",
        supportedPlatforms: ["amiga"],
        platforms: {
          beos: { scriptModules: [{ name: "foo", sources: ["foo.lua"] }] },
        },
      });

      expect(state.errors).to.deep.equal([
        "unsupported platform 'amiga': no build-tool equivalent defined",
        "unsupported platform 'beos': no build-tool equivalent defined",
        "unsupported platform 'beos': no build-tool equivalent defined",
      ]);
      expect(state.supportedPlatforms).to.deep.equal([]);
      expect(state.platformScriptTargets.size).to.equal(0);
    });

    it("should record declared errors after an unsupported build type", () => {
      const state = createConfiguration("foo");

      applyDescription(state, {
        package: "foo",
        buildType: "make",
        errors: ["missing dependency"],
      });

      expect(state.errors).to.deep.equal([
        "build type 'make' is not supported, only 'builtin' builds can be generated",
        "missing dependency",
      ]);
    });
  });

  describe("generateFromDescription", () => {
    it("should render the script and return recorded errors", () => {
      const result = generateFromDescription({
        package: "bar",
        unsupportedPlatforms: ["windows"],
        platforms: { amiga: { variables: { X: "1" } } },
      });

      expect(result.errors).to.deep.equal([
        "unsupported platform 'amiga': no build-tool equivalent defined",
      ]);
      expect(result.script).to.include("project(bar C CXX)\n");
      expect(result.script).to.include("if (WIN32)\n");
      expect(result.script).to.not.include("set(X 1)");
    });

    it("should render values with comment and paren characters intact", () => {
      const result = generateFromDescription({
        package: "foo",
        variables: { FLAGS: "-DX #1", CALL: "f(x)" },
      });

      const lines = result.script.split("\n");
      expect(lines).to.include('set(FLAGS "-DX #1")');
      expect(lines).to.include('set(CALL "f(x)")');
    });
  });
});
