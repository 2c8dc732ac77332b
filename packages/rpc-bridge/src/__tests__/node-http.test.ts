import * as Effect from "effect/Effect"
import type { IncomingHttpHeaders, OutgoingHttpHeaders } from "node:http"
import { Readable } from "node:stream"
import { describe, expect, it } from "vitest"
import { ServerListenError } from "../errors/index.js"
import {
  createNodeListener,
  handleNodeRequest,
  type NodeResponseLike,
  nodeToBridgeRequest,
  nodeToWebRequest,
  type NodeListener,
  readBody,
  serveBridge,
  type ServerLike,
  webToNodeResponse,
} from "../node/http.js"
import { createBridge } from "../server/handler.js"
import { BridgeLoggerSilent } from "../shared/logging.js"
import { decodeBody } from "../shared/response.js"
import { LibraryLive } from "./test-utils/index.js"

const nodeRequest = (
  method: string,
  url: string,
  chunks: Array<string | Uint8Array>,
  headers: IncomingHttpHeaders = {},
) => Object.assign(Readable.from(chunks), { method, url, headers: { host: "localhost", ...headers } })

class FakeResponse implements NodeResponseLike {
  status = 0
  headers: OutgoingHttpHeaders = {}
  body = ""
  onEnd: () => void = () => {}

  writeHead(status: number, headers: OutgoingHttpHeaders) {
    this.status = status
    this.headers = headers
    return this
  }

  end(chunk: Uint8Array) {
    this.body = new TextDecoder().decode(chunk)
    this.onEnd()
    return this
  }
}

const bridge = createBridge(LibraryLive, { logger: BridgeLoggerSilent })

describe("readBody", () => {
  it("concatenates chunks", async () => {
    const body = await Effect.runPromise(readBody(Readable.from([Buffer.from("ab"), "cd"]), 10))
    expect(decodeBody(body)).toBe("abcd")
  })

  it("fails once the body grows past the limit", async () => {
    const error = await Effect.runPromise(Effect.flip(readBody(Readable.from(["abc", "def", "ghi"]), 4)))
    expect(error).toMatchObject({ _tag: "PayloadTooLargeError", maxSize: 4, receivedSize: 6 })
  })

  it("reads a body of many chunks in order", async () => {
    const chunks = Array.from({ length: 2000 }, (_, i) => String(i % 10))
    const body = await Effect.runPromise(readBody(Readable.from(chunks), 2000))
    expect(body.length).toBe(2000)
    expect(decodeBody(body.subarray(0, 12))).toBe("012345678901")
  })

  it("starts from an empty body on every run", async () => {
    const source = {
      async *[Symbol.asyncIterator]() {
        yield "abc"
      },
    }
    const body = readBody(source, 4)
    expect(decodeBody(await Effect.runPromise(body))).toBe("abc")
    expect(decodeBody(await Effect.runPromise(body))).toBe("abc")
  })
})

describe("nodeToBridgeRequest", () => {
  it("splits the URL and joins repeated headers", async () => {
    const request = await Effect.runPromise(
      nodeToBridgeRequest(
        nodeRequest("post", "/?method=addBook", ['{"title":', '"Ubik"}'], { "x-tag": ["a", "b"] }),
      ),
    )
    expect(request.method).toBe("POST")
    expect(request.path).toBe("/")
    expect(request.query).toBe("method=addBook")
    expect(request.headers.get("x-tag")).toBe("a, b")
    expect(decodeBody(request.body)).toBe('{"title":"Ubik"}')
  })

  it("does not read the body of a GET", async () => {
    const request = await Effect.runPromise(nodeToBridgeRequest(nodeRequest("GET", "/books/1", ["ignored"])))
    expect(request.body.length).toBe(0)
  })
})

describe("handleNodeRequest", () => {
  it("writes the bridge response", async () => {
    const res = new FakeResponse()
    await Effect.runPromise(
      handleNodeRequest(bridge, nodeRequest("POST", "/?method=addBook", ['{"title":"Ubik"}']), res),
    )
    expect(res.status).toBe(200)
    expect(res.headers["Content-Type"]).toBe("application/json")
    expect(res.headers["Access-Control-Allow-Methods"]).toBe("POST, OPTIONS")
    expect(res.body).toBe('{"id":100,"title":"Ubik"}')
  })

  it("answers an oversized body with 413", async () => {
    const small = createBridge(LibraryLive, { logger: BridgeLoggerSilent, maxBodySize: 4 })
    const res = new FakeResponse()
    await Effect.runPromise(
      handleNodeRequest(small, nodeRequest("POST", "/?method=addBook", ['{"title":"Ubik"}']), res),
    )
    expect(res.status).toBe(413)
    expect(JSON.parse(res.body)).toEqual({
      _type: "error",
      _tag: "request_entity_too_large",
      message: "Request body too large: received 16 bytes, max 4 bytes",
    })
  })

  it("adds the CORS headers to a 413", async () => {
    const small = createBridge(LibraryLive, {
      logger: BridgeLoggerSilent,
      maxBodySize: 4,
      allowedOrigins: ["example.com"],
    })
    const res = new FakeResponse()
    await Effect.runPromise(
      handleNodeRequest(
        small,
        nodeRequest("POST", "/?method=addBook", ['{"title":"Ubik"}'], { origin: "https://example.com" }),
        res,
      ),
    )
    expect(res.status).toBe(413)
    expect(res.headers).toEqual({
      "Content-Type": "application/json",
      Vary: "Origin",
      "Access-Control-Allow-Methods": "POST, OPTIONS",
      "Access-Control-Allow-Origin": "https://example.com",
    })
  })
})

describe("createNodeListener", () => {
  it("serves requests with the node:http listener signature", async () => {
    const res = new FakeResponse()
    const done = new Promise<void>((resolve) => {
      res.onEnd = resolve
    })
    createNodeListener(bridge)(nodeRequest("GET", "/books/1", []), res)
    await done
    expect(res.status).toBe(200)
    expect(res.body).toBe('{"id":1,"title":"Dune"}')
  })
})

describe("web standard conversion", () => {
  it("converts a Node.js request to a Request", async () => {
    const request = await nodeToWebRequest(nodeRequest("POST", "/?method=addBook", ['{"title":"Ubik"}']))
    expect(request.url).toBe("http://localhost/?method=addBook")
    expect(request.method).toBe("POST")
    expect(await request.text()).toBe('{"title":"Ubik"}')
  })

  it("rejects an oversized body", async () => {
    await expect(
      nodeToWebRequest(nodeRequest("POST", "/", ["0123456789"]), { maxBodySize: 4 }),
    ).rejects.toMatchObject({ _tag: "PayloadTooLargeError" })
  })

  it("writes a Response to a Node.js response", async () => {
    const res = new FakeResponse()
    await webToNodeResponse(new Response("hi", { status: 201, headers: { "x-a": "1" } }), res)
    expect(res.status).toBe(201)
    expect(res.headers["x-a"]).toBe("1")
    expect(res.body).toBe("hi")
  })
})

describe("serveBridge", () => {
  class FakeServer implements ServerLike {
    address: string | undefined
    closed = false
    errorListeners: Array<(error: Error) => void> = []

    constructor(
      readonly listener: NodeListener,
      readonly failure?: Error,
    ) {}

    listen(port: number, host: string, onListening: () => void) {
      if (this.failure !== undefined) {
        for (const onError of this.errorListeners) onError(this.failure)
        return this
      }
      this.address = `${host}:${port}`
      onListening()
      return this
    }

    once(_event: "error", listener: (error: Error) => void) {
      this.errorListeners.push(listener)
      return this
    }

    off(_event: "error", listener: (error: Error) => void) {
      this.errorListeners = this.errorListeners.filter((current) => current !== listener)
      return this
    }

    close(onClose: (error?: Error) => void) {
      this.closed = true
      onClose()
      return this
    }
  }

  it("listens on the configured address until the scope closes", async () => {
    const servers: Array<FakeServer> = []
    const makeServer = (listener: NodeListener) => {
      const server = new FakeServer(listener)
      servers.push(server)
      return server
    }

    await Effect.runPromise(
      Effect.scoped(
        Effect.gen(function* () {
          yield* serveBridge(bridge, { host: "127.0.0.1", port: 9322 }, makeServer)
          expect(servers[0]?.address).toBe("127.0.0.1:9322")
          expect(servers[0]?.closed).toBe(false)
          expect(servers[0]?.errorListeners).toEqual([])
        }),
      ),
    )
    expect(servers[0]?.closed).toBe(true)
  })

  it("hands the server a listener that answers requests", async () => {
    const servers: Array<FakeServer> = []
    await Effect.runPromise(
      Effect.scoped(
        serveBridge(bridge, { host: "127.0.0.1", port: 9322 }, (listener) => {
          const server = new FakeServer(listener)
          servers.push(server)
          return server
        }),
      ),
    )
    const res = new FakeResponse()
    const done = new Promise<void>((resolve) => {
      res.onEnd = resolve
    })
    servers[0]?.listener(nodeRequest("GET", "/books/1", []), res)
    await done
    expect(res.body).toBe('{"id":1,"title":"Dune"}')
  })

  it("fails when the address cannot be bound", async () => {
    const error = await Effect.runPromise(
      Effect.flip(
        Effect.scoped(
          serveBridge(
            bridge,
            { host: "127.0.0.1", port: 9322 },
            (listener) => new FakeServer(listener, new Error("listen EADDRINUSE")),
          ),
        ),
      ),
    )
    expect(error).toBeInstanceOf(ServerListenError)
    expect(error.message).toBe("Cannot listen on 127.0.0.1:9322: listen EADDRINUSE")
  })
})
