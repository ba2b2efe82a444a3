import { Writable } from "node:stream"
import { toHttpError } from "@faultline/errors"
import pino from "pino"
import { createPinoLogger, PinoLogger } from "../pino-logger"

function makeLineDestination() {
  const lines: string[] = []

  const destination = new Writable({
    write(chunk, _encoding, callback) {
      const line = chunk.toString("utf8").trim()
      if (line) lines.push(line)
      callback()
    },
  })

  return { lines, destination }
}

function parseLine(line: string | undefined): Record<string, unknown> {
  return JSON.parse(line ?? "{}")
}

describe("PinoLogger behavior", () => {
  it("emits JSON to the provided destination (no base)", () => {
    const { lines, destination } = makeLineDestination()

    const logger = new PinoLogger({ destination }, { level: "trace" }, { requestId: "r-1" })

    logger.info("hello", { route: "/health" })

    expect(lines).toHaveLength(1)

    const payload = parseLine(lines[0])

    expect(payload).toMatchObject({
      msg: "hello",
      requestId: "r-1",
      route: "/health",
    })

    expect(typeof payload.time).toBe("number")
    expect(typeof payload.level).toBe("number")
  })

  it("child() inherits the base logger sink and config", () => {
    const { lines, destination } = makeLineDestination()

    const base = new PinoLogger({ destination }, { level: "warn" }, { requestId: "r-1" })
    const child = base.child({ route: "/orders" })

    child.info("ignored")
    child.warn("logged")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines[0])).toMatchObject({
      msg: "logged",
      requestId: "r-1",
      route: "/orders",
    })
  })

  it("wraps an existing pino logger when given as base", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ base: pino({ level: "info" }, destination) }, {}, {
      service: "orders",
    })

    logger.debug("ignored")
    logger.info("kept")

    expect(lines).toHaveLength(1)
    expect(parseLine(lines[0])).toMatchObject({ msg: "kept", service: "orders" })
  })

  it("serializes a standard error with its cause", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "info" })

    logger.error("failed", { err: new Error("outer", { cause: new Error("inner") }) })

    expect(parseLine(lines[0]).err).toMatchObject({
      type: "Error",
      message: "outer",
      cause: { type: "Error", message: "inner" },
    })
  })

  it("serializes an adapted foreign error as a chain", () => {
    const { lines, destination } = makeLineDestination()

    const logger = createPinoLogger({ destination }, { level: "info" })

    logger.error("failed", { err: toHttpError(new Error("boom")) })

    expect(parseLine(lines[0]).err).toEqual({
      name: "ChainedHttpError",
      message: "boom",
      innerMessage: "boom",
      messages: ["boom"],
      responseCode: -1,
      errorCode: "",
      retriable: true,
      stack: "Stack trace unavailable",
    })
  })
})
