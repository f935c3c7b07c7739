import { describe, expect, it } from "@effect/vitest"
import { Effect, Logger } from "effect"

import { runCli } from "../../src/app/program.js"
import { provideNodeContext, withTempDir, writeFixture } from "./test-helpers.js"

const users = JSON.stringify({
  data: [
    { name: "Alice", id: 1, tags: ["a"] },
    { name: "Bob", id: 2, tags: [] }
  ]
})

describe("runCli", () => {
  it.effect("formats a JSON file densely", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture(context, "users.json", users))
        const result = yield* _(runCli(["node", "dense-json", "format", "--file", file, "--silent"]))
        expect(result.output).toBe(
          [
            "{",
            "    \"data\": [",
            "        {",
            "            \"name\": \"Alice\",",
            "            \"id\": 1,",
            "            \"tags\": [\"a\"]",
            "        },",
            "        {",
            "            \"name\": \"Bob\",",
            "            \"id\": 2,",
            "            \"tags\": []",
            "        }",
            "    ]",
            "}"
          ].join("\n")
        )
      })
    ).pipe(provideNodeContext))

  it.effect("reads the indent from an explicit config file", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture(context, "in.json", "{\"a\": {\"b\": [1]}}"))
        const config = yield* _(writeFixture(context, "config.json", "{\"indent\": 2}"))
        const result = yield* _(runCli(["node", "dense-json", "--file", file, "--config", config, "--silent"]))
        expect(result.output).toBe("{\n  \"a\": {\n    \"b\": [1]\n  }\n}")
      })
    ).pipe(provideNodeContext))

  it.effect("gets a value by path", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture(context, "users.json", users))
        const result = yield* _(runCli(["node", "dense-json", "get", "--file", file, "--path", "data/1", "--silent"]))
        expect(result.output).toBe("{\n    \"name\": \"Bob\",\n    \"id\": 2,\n    \"tags\": []\n}")
      })
    ).pipe(provideNodeContext))

  it.effect("indexes strings only when asked to", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture(context, "users.json", users))
        const base = ["node", "dense-json", "get", "--file", file, "--path", "data/0/name/0", "--silent"]
        const indexed = yield* _(runCli([...base, "--index-strings"]))
        expect(indexed.output).toBe("\"A\"")
        const error = yield* _(Effect.flip(runCli(base)))
        expect(error._tag).toBe("PathError")
        if (error._tag === "PathError") {
          expect(error.remainder).toBe("0")
          expect(error.value).toBe("Alice")
        }
      })
    ).pipe(provideNodeContext))

  it.effect("picks fields from a list of records", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture(context, "list.json", "[{\"a\": 1, \"ab\": 2}, {\"c\": 3}]"))
        const result = yield* _(runCli(["node", "dense-json", "pick", "--file", file, "--terms", "a", "--silent"]))
        expect(result.output).toBe("[\n    {\"a\": 1, \"ab\": 2}\n]")
        const both = yield* _(runCli(["node", "dense-json", "pick", "--file", file, "--terms", "b,c", "--silent"]))
        expect(both.output).toBe("[\n    {\"ab\": 2},\n    {\"c\": 3}\n]")
      })
    ).pipe(provideNodeContext))

  it.effect("rejects pick on a non-list root", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture(context, "obj.json", "{\"a\": 1}"))
        const error = yield* _(Effect.flip(runCli(["node", "dense-json", "pick", "--file", file, "--terms", "a"])))
        expect(error).toEqual({
          _tag: "JsonTypeError",
          typeName: "dict",
          message: "pick: expected list of dict, got 'dict'"
        })
      })
    ).pipe(provideNodeContext))

  it.effect("fails with typed errors for unreadable input", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const broken = yield* _(writeFixture(context, "broken.json", "{not json"))
        const parseError = yield* _(Effect.flip(runCli(["node", "dense-json", "--file", broken])))
        expect(parseError._tag).toBe("ParseError")
        const missing = context.path.join(context.tempDir, "missing.json")
        const fileError = yield* _(Effect.flip(runCli(["node", "dense-json", "--file", missing])))
        expect(fileError._tag).toBe("FileError")
        const configError = yield* _(
          Effect.flip(runCli(["node", "dense-json", "--file", broken, "--config", missing]))
        )
        expect(configError).toEqual({ _tag: "FileError", message: `Config file not found: ${missing}` })
      })
    ).pipe(provideNodeContext))

  it.effect("rejects invalid config values", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture(context, "in.json", "[]"))
        const config = yield* _(writeFixture(context, "config.json", "{\"indent\": -2}"))
        const error = yield* _(Effect.flip(runCli(["node", "dense-json", "--file", file, "--config", config])))
        expect(error._tag).toBe("ConfigError")
      })
    ).pipe(provideNodeContext))

  it.effect("rejects a config indent wider than the limit", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture(context, "in.json", "[]"))
        const config = yield* _(writeFixture(context, "config.json", "{\"indent\": 17}"))
        const error = yield* _(Effect.flip(runCli(["node", "dense-json", "--file", file, "--config", config])))
        expect(error._tag).toBe("ConfigError")
      })
    ).pipe(provideNodeContext))

  it.effect("keeps __proto__ keys from the input as ordinary fields", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture(context, "proto.json", "{\"__proto__\": {\"x\": 1}, \"b\": 2}"))
        const formatted = yield* _(runCli(["node", "dense-json", "--file", file, "--silent"]))
        expect(formatted.output).toBe("{\n    \"__proto__\": {\"x\": 1},\n    \"b\": 2\n}")
        const got = yield* _(runCli(["node", "dense-json", "get", "--file", file, "--path", "__proto__/x", "--silent"]))
        expect(got.output).toBe("1")
        const list = yield* _(writeFixture(context, "list.json", "[{\"__proto__\": 1, \"a\": 2}]"))
        const picked = yield* _(runCli(["node", "dense-json", "pick", "--file", list, "--terms", "proto", "--silent"]))
        expect(picked.output).toBe("[\n    {\"__proto__\": 1}\n]")
      })
    ).pipe(provideNodeContext))

  it.effect("logs the input size at debug level", () =>
    withTempDir((context) =>
      Effect.gen(function*(_) {
        const file = yield* _(writeFixture(context, "in.json", "{\"é\": 1}"))
        const messages: Array<string> = []
        const capture = Logger.replace(
          Logger.defaultLogger,
          Logger.make(({ message }) => {
            messages.push(String(message))
          })
        )
        yield* _(runCli(["node", "dense-json", "--file", file, "--silent", "--verbose"]).pipe(Effect.provide(capture)))
        expect(messages).toContain(`read ${file}: 9 bytes`)
        messages.length = 0
        yield* _(runCli(["node", "dense-json", "--file", file, "--silent"]).pipe(Effect.provide(capture)))
        expect(messages).toEqual([])
      })
    ).pipe(provideNodeContext))
})
