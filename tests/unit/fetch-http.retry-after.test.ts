import http from "http";
import type { AddressInfo } from "net";
import { FetchHttp } from "../../src/infrastructure/http/FetchHttp";
import { asText } from "../../src/infrastructure/http/bodies";
import type { Request } from "../../src/ports/Http";

type TestServer = {
  baseUrl: string;
  close: () => Promise<void>;
};

const startServer = async (
  handler: (req: http.IncomingMessage, res: http.ServerResponse) => void
): Promise<TestServer> => {
  const server = http.createServer(handler);
  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", () => resolve());
  });

  const address = server.address() as AddressInfo;
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      })
  };
};

const textRequest = (baseUrl: string): Request<string> => ({
  method: "GET",
  url: new URL(`${baseUrl}/view/submissionList`),
  readBody: asText()
});

describe("FetchHttp Retry-After support", () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it("respects Retry-After on 429 and eventually succeeds", async () => {
    const randomSpy = jest.spyOn(Math, "random").mockReturnValue(0);
    const timeoutSpy = jest.spyOn(global, "setTimeout");

    let requests = 0;
    const server = await startServer((_req, res) => {
      requests += 1;
      if (requests === 1) {
        res.writeHead(429, {
          "content-type": "text/plain",
          "Retry-After": "1"
        });
        res.end("rate limited");
        return;
      }

      res.writeHead(200, { "content-type": "text/xml" });
      res.end("<idChunk/>");
    });

    const client = new FetchHttp();
    const response = await client.execute(textRequest(server.baseUrl));

    expect(response.ok).toBe(true);
    expect(requests).toBe(2);
    const usedRetryAfterDelay = timeoutSpy.mock.calls.some((call) => call[1] === 1000);
    expect(usedRetryAfterDelay).toBe(true);

    await server.close();
    timeoutSpy.mockRestore();
    randomSpy.mockRestore();
  });

  it.each(["missing", "invalid", "overflowing"] as const)(
    "falls back to normal backoff when Retry-After is %s",
    async (mode) => {
      const randomSpy = jest.spyOn(Math, "random").mockReturnValue(0);
      const timeoutSpy = jest.spyOn(global, "setTimeout");

      let requests = 0;
      const server = await startServer((_req, res) => {
        requests += 1;
        if (requests === 1) {
          const headers: Record<string, string> = { "content-type": "text/plain" };
          if (mode === "invalid") headers["Retry-After"] = "NaN";
          if (mode === "overflowing") headers["Retry-After"] = "999999999999999999999999999999999999";
          res.writeHead(429, headers);
          res.end("rate limited");
          return;
        }

        res.writeHead(200, { "content-type": "text/xml" });
        res.end("<idChunk/>");
      });

      const client = new FetchHttp();
      const response = await client.execute(textRequest(server.baseUrl));

      expect(response.ok).toBe(true);
      expect(requests).toBe(2);

      const usedFallbackBackoff = timeoutSpy.mock.calls.some((call) => call[1] === 250);
      const usedCappedDelay = timeoutSpy.mock.calls.some((call) => call[1] === 5000);
      expect(usedFallbackBackoff).toBe(true);
      expect(usedCappedDelay).toBe(false);

      await server.close();
      timeoutSpy.mockRestore();
      randomSpy.mockRestore();
    }
  );
});
