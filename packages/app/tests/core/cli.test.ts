import { describe, expect, it } from "@effect/vitest"
import { Effect } from "effect"

import { parseCliArgs } from "../../src/core/cli.js"
import { resolveConfig } from "../../src/core/config.js"
import { leftOf, rightOf } from "./fixtures.js"

const argv = (...args: ReadonlyArray<string>): ReadonlyArray<string> => ["node", "slib-deps", ...args]

describe("parseCliArgs", () => {
  it.effect("defaults to the leaves command with a positional report", () =>
    Effect.sync(() => {
      expect(rightOf(parseCliArgs(argv("libfoo.json")))).toEqual({
        task: { command: "leaves" },
        reportPath: "libfoo.json",
        configPath: undefined,
        configPathExplicit: false,
        json: undefined,
        silent: false,
        verbose: false,
        failOnIncomplete: undefined
      })
    }))

  it.effect("parses verify with inline and separate flag values", () =>
    Effect.sync(() => {
      const parsed = rightOf(
        parseCliArgs(argv("verify", "--report=libfoo.json", "--list", "objects.txt", "--fail-on-incomplete", "--json"))
      )
      expect(parsed?.task).toEqual({ command: "verify", listPath: "objects.txt" })
      expect(parsed?.reportPath).toBe("libfoo.json")
      expect(parsed?.failOnIncomplete).toBe(true)
      expect(parsed?.json).toBe(true)
    }))

  it.effect("marks an explicit config path", () =>
    Effect.sync(() => {
      const parsed = rightOf(parseCliArgs(argv("empty", "--config", "ci.json")))
      expect(parsed?.task).toEqual({ command: "empty" })
      expect(parsed?.configPath).toBe("ci.json")
      expect(parsed?.configPathExplicit).toBe(true)
    }))

  it.effect("requires --list for verify", () =>
    Effect.sync(() => {
      expect(leftOf(parseCliArgs(argv("verify", "libfoo.json")))).toEqual({
        _tag: "CliError",
        message: "verify requires --list <object_list>"
      })
    }))

  it.effect("rejects --list outside verify", () =>
    Effect.sync(() => {
      expect(leftOf(parseCliArgs(argv("empty", "--list", "objects.txt")))?.message).toBe(
        "--list is only accepted by verify, not empty"
      )
    }))

  it.effect("rejects unknown flags, short flags and missing values", () =>
    Effect.sync(() => {
      expect(leftOf(parseCliArgs(argv("--nope")))?.message).toBe("Unknown flag: --nope")
      expect(leftOf(parseCliArgs(argv("-e")))?.message).toBe("Unknown flag: -e")
      expect(leftOf(parseCliArgs(argv("--report", "--json")))?.message).toBe("Missing value for --report")
      expect(leftOf(parseCliArgs(argv("--toString")))?.message).toBe("Unknown flag: --toString")
    }))

  it.effect("rejects a second positional argument", () =>
    Effect.sync(() => {
      expect(leftOf(parseCliArgs(argv("a.json", "b.json")))?.message).toBe("Unexpected positional argument: b.json")
    }))
})

describe("resolveConfig", () => {
  it.effect("lets CLI flags override the config file", () =>
    Effect.sync(() => {
      const cli = rightOf(parseCliArgs(argv("cli.json", "--json")))
      if (cli === undefined) {
        throw new Error("expected parsed arguments")
      }
      expect(rightOf(resolveConfig(cli, { report: "file.json", json: false, failOnIncomplete: true }))).toEqual({
        reportPath: "cli.json",
        json: true,
        failOnIncomplete: true
      })
    }))

  it.effect("falls back to the config file and then to defaults", () =>
    Effect.sync(() => {
      const cli = rightOf(parseCliArgs(argv("leaves")))
      if (cli === undefined) {
        throw new Error("expected parsed arguments")
      }
      expect(rightOf(resolveConfig(cli, { report: "file.json" }))).toEqual({
        reportPath: "file.json",
        json: false,
        failOnIncomplete: false
      })
      expect(leftOf(resolveConfig(cli, undefined))?._tag).toBe("ConfigError")
    }))
})
