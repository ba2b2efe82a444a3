import { newError, wrap } from "@faultline/errors"
import { serializeLoggedError } from "../serialize-logged-error"

describe("serializeLoggedError", () => {
  it("serializes error chains with their resolved attributes and stack trace", () => {
    const root = newError("disk full").setErrorCode("storage_full").setRetriable(false)
    const err = wrap(root, "saving upload").setResponseCode(507)

    expect(serializeLoggedError(err)).toEqual({
      name: "ChainedHttpError",
      message: "saving upload",
      innerMessage: "disk full",
      messages: ["saving upload", "disk full"],
      responseCode: 507,
      errorCode: "storage_full",
      retriable: false,
      stack: root.capturedStack,
    })
  })

  it("serializes standard errors in pino's shape", () => {
    const err = new TypeError("bad type")

    expect(serializeLoggedError(err)).toMatchObject({
      type: "TypeError",
      message: "bad type",
      stack: err.stack,
    })
  })

  it("passes anything else through", () => {
    const value = { reason: "timeout" }

    expect(serializeLoggedError(value)).toBe(value)
    expect(serializeLoggedError("boom")).toBe("boom")
  })
})
