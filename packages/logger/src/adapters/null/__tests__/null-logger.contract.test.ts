import { newError } from "@faultline/errors"
import { createNullLogger, NullLogger } from "../null-logger"

describe("NullLogger contract", () => {
  it("never throws for any method", () => {
    const logger = new NullLogger()
    const err = newError("ignored")

    expect(() => logger.trace("x")).not.toThrow()
    expect(() => logger.debug("x")).not.toThrow()
    expect(() => logger.info("x")).not.toThrow()
    expect(() => logger.warn("x")).not.toThrow()
    expect(() => logger.error("x", { err })).not.toThrow()
    expect(() => logger.fatal("x", { err })).not.toThrow()
  })

  it("child() returns a logger and remains a no-op", () => {
    const child = createNullLogger().child({ requestId: "r-1" })

    expect(child).toBeInstanceOf(NullLogger)
    expect(() => child.info("x")).not.toThrow()
  })
})
