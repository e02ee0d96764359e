/**
 * Tests for configuration setters
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  addNativeTarget,
  addScriptTarget,
  addSupportedPlatform,
  addUnsupportedPlatform,
  createConfiguration,
  recordFatalError,
  setVariable,
} from "./configuration.js";
import type { ConfigurationState } from "./types.js";

const snapshotOf = (state: ConfigurationState) => ({
  supportedPlatforms: [...state.supportedPlatforms],
  unsupportedPlatforms: [...state.unsupportedPlatforms],
  variables: [...state.variables],
  platformVariables: [...state.platformVariables].map(([p, vars]) => [
    p,
    [...vars],
  ]),
  scriptTargets: [...state.scriptTargets],
  platformScriptTargets: [...state.platformScriptTargets],
  nativeTargets: [...state.nativeTargets],
  platformNativeTargets: [...state.platformNativeTargets],
});

describe("Configuration", () => {
  describe("createConfiguration", () => {
    it("should start empty", () => {
      const state = createConfiguration("foo");
      expect(state.packageName).to.equal("foo");
      expect(state.errors).to.deep.equal([]);
      expect(state.variables.size).to.equal(0);
      expect(state.platformVariables.size).to.equal(0);
      expect(state.scriptTargets).to.deep.equal([]);
      expect(state.nativeTargets).to.deep.equal([]);
    });
  });

  describe("recordFatalError", () => {
    it("should append errors in order", () => {
      const state = createConfiguration("foo");
      recordFatalError(state, "first");
      recordFatalError(state, "second");
      expect(state.errors).to.deep.equal(["first", "second"]);
    });
  });

  describe("platform lists", () => {
    it("should record supported and unsupported platforms in order", () => {
      const state = createConfiguration("foo");
      addSupportedPlatform(state, "linux");
      addSupportedPlatform(state, "macosx");
      addUnsupportedPlatform(state, "windows");

      expect(state.supportedPlatforms).to.deep.equal(["linux", "macosx"]);
      expect(state.unsupportedPlatforms).to.deep.equal(["windows"]);
      expect(state.errors).to.deep.equal([]);
    });

    it("should allow a platform in both lists", () => {
      const state = createConfiguration("foo");
      addSupportedPlatform(state, "unix");
      addUnsupportedPlatform(state, "unix");

      expect(state.supportedPlatforms).to.deep.equal(["unix"]);
      expect(state.unsupportedPlatforms).to.deep.equal(["unix"]);
    });
  });

  describe("setVariable", () => {
    it("should write default variables", () => {
      const state = createConfiguration("foo");
      setVariable(state, "LUA_VERSION", "5.1");
      expect(state.variables.get("LUA_VERSION")).to.equal("5.1");
      expect(state.platformVariables.size).to.equal(0);
    });

    it("should write platform variables separately from defaults", () => {
      const state = createConfiguration("foo");
      setVariable(state, "CFLAGS", "-O2");
      setVariable(state, "CFLAGS", "/O2", "windows");
      setVariable(state, "EXTRA", "1", "windows");

      expect(state.variables.get("CFLAGS")).to.equal("-O2");
      expect([...(state.platformVariables.get("windows") ?? [])]).to.deep.equal(
        [
          ["CFLAGS", "/O2"],
          ["EXTRA", "1"],
        ]
      );
    });

    it("should keep the first position when a variable is reassigned", () => {
      const state = createConfiguration("foo");
      setVariable(state, "A", "1");
      setVariable(state, "B", "2");
      setVariable(state, "A", "3");
      expect([...state.variables]).to.deep.equal([
        ["A", "3"],
        ["B", "2"],
      ]);
    });
  });

  describe("targets", () => {
    it("should append script and native targets per scope", () => {
      const state = createConfiguration("foo");
      addScriptTarget(state, "foo");
      addScriptTarget(state, "foo.win", "windows");
      addNativeTarget(state, "foo.core");
      addNativeTarget(state, "foo.posix", "unix");
      addNativeTarget(state, "foo.posix2", "unix");

      expect(state.scriptTargets).to.deep.equal(["foo"]);
      expect(state.platformScriptTargets.get("windows")).to.deep.equal([
        "foo.win",
      ]);
      expect(state.nativeTargets).to.deep.equal(["foo.core"]);
      expect(state.platformNativeTargets.get("unix")).to.deep.equal([
        "foo.posix",
        "foo.posix2",
      ]);
    });

    it("should preserve duplicate names", () => {
      const state = createConfiguration("foo");
      addScriptTarget(state, "foo");
      addScriptTarget(state, "foo");
      expect(state.scriptTargets).to.deep.equal(["foo", "foo"]);
    });
  });

  describe("invalid platforms", () => {
    const message =
      "unsupported platform 'amiga': no build-tool equivalent defined";

    const setters: readonly [string, (state: ConfigurationState) => void][] = [
      ["addSupportedPlatform", (s) => addSupportedPlatform(s, "amiga")],
      ["addUnsupportedPlatform", (s) => addUnsupportedPlatform(s, "amiga")],
      ["setVariable", (s) => setVariable(s, "X", "1", "amiga")],
      ["addScriptTarget", (s) => addScriptTarget(s, "foo", "amiga")],
      ["addNativeTarget", (s) => addNativeTarget(s, "foo", "amiga")],
    ];

    for (const [name, apply] of setters) {
      it(`${name} should only append one error`, () => {
        const state = createConfiguration("foo");
        setVariable(state, "KEEP", "1");
        addScriptTarget(state, "keep");
        recordFatalError(state, "earlier");
        const before = snapshotOf(state);

        apply(state);

        expect(snapshotOf(state)).to.deep.equal(before);
        expect(state.errors).to.deep.equal(["earlier", message]);
      });
    }
  });
});
