import { Writable } from "node:stream"
import pino from "pino"

import { PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parse(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "null") as Record<string, unknown>
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger(
      { destination },
      { level: "trace", prettify: false },
      { cache: "sessions" },
    )

    logger.info("hello", { policy: "lru" })

    expect(lines).toHaveLength(1)

    const payload = parse(lines[0])

    expect(payload).toMatchObject({ msg: "hello", cache: "sessions", policy: "lru" })
    expect(payload.level).toBe(30)
    expect(typeof payload.time).toBe("number")
  })

  it("serializes err with its cause chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" })

    logger.error("failed", { err: new Error("outer", { cause: new Error("inner") }) })

    const err = parse(lines[0]).err

    expect(err).toMatchObject({ type: "Error", message: "outer" })
    expect(err).toHaveProperty("cause")
  })

  it("child() inherits the sink and the level", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { module: "alerts" })
    const child = base.child({ policy: "lfu" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parse(lines[0])).toMatchObject({
      msg: "logged",
      module: "alerts",
      policy: "lfu",
    })
  })

  it("derives from an existing pino logger when one is given as base", () => {
    const { lines, destination } = makeLineDestination()

    const root = pino({ level: "debug" }, destination)
    const logger = new PinoLogger({ base: root }, {}, { service: "api" })

    logger.debug("from base")

    expect(parse(lines[0])).toMatchObject({ msg: "from base", service: "api" })
  })
})
