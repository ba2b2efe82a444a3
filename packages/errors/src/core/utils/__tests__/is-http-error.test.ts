import { FakeHttpError } from "../../__tests__/mocks/fake-http-error"
import { createHttpError, newError, wrap } from "../create-error"
import { isHttpError } from "../is-http-error"
import { toHttpError } from "../to-http-error"

describe("isHttpError", () => {
  describe("returns true", () => {
    it("for a root error", () => {
      expect(isHttpError(newError("test"))).toBe(true)
    })

    it("for a wrapped error", () => {
      expect(isHttpError(wrap(new Error("test"), "outer"))).toBe(true)
    })

    it("for errors built by createHttpError and toHttpError", () => {
      expect(isHttpError(createHttpError(400, "bad"))).toBe(true)
      expect(isHttpError(toHttpError("text"))).toBe(true)
    })

    it("for another implementation of the interface", () => {
      expect(isHttpError(new FakeHttpError())).toBe(true)
    })
  })

  describe("returns false", () => {
    it("for null", () => {
      expect(isHttpError(null)).toBe(false)
    })

    it("for undefined", () => {
      expect(isHttpError(undefined)).toBe(false)
    })

    it("for string", () => {
      expect(isHttpError("error")).toBe(false)
    })

    it("for standard Error", () => {
      expect(isHttpError(new Error("standard"))).toBe(false)
    })

    it("for an error missing an accessor", () => {
      const partial = Object.assign(new Error("partial"), {
        responseCode: () => 500,
        errorCode: () => "partial",
      })

      expect(isHttpError(partial)).toBe(false)
    })

    it("for an object missing message", () => {
      const { message: _, ...rest } = {
        message: "x",
        name: "X",
        ...methodsOf(new FakeHttpError()),
      }

      expect(isHttpError(rest)).toBe(false)
    })
  })
})

function methodsOf(err: FakeHttpError): Record<string, unknown> {
  return {
    messages: err.messages,
    fullMessage: err.fullMessage,
    outerMessage: err.outerMessage,
    innerMessage: err.innerMessage,
    setResponseCode: err.setResponseCode,
    responseCode: err.responseCode,
    setErrorCode: err.setErrorCode,
    errorCode: err.errorCode,
    stackTrace: err.stackTrace,
    setRetriable: err.setRetriable,
    retriable: err.retriable,
  }
}
