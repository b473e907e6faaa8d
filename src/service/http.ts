import env from "@/env";
import { getLogger } from "@/logger";
import type { LiveDataStore } from "@/service/liveData";
import type { IncomingMessage, ServerResponse } from "node:http";
import { createServer } from "node:http";
import type { AddressInfo } from "node:net";
import { promisify } from "node:util";

const logger = getLogger("HTTP");

type HttpServer = {
  close: () => Promise<void>;
  port: number;
};

function sendJson(res: ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

export default async function initializeHttpServer(
  liveData: LiveDataStore,
): Promise<HttpServer> {
  const server = createServer();

  server.on("request", (req: IncomingMessage, res: ServerResponse) => {
    const pathname = req.url?.split("?")[0];
    if (req.method !== "GET") {
      sendJson(res, 404, { error: "Not Found" });
      return;
    }

    switch (pathname) {
      case "/health":
        sendJson(res, 200, {
          status: "ok",
          uptime: process.uptime(),
          timestamp: Date.now(),
          lastTelegramAt: liveData.lastReceivedAt ?? null,
        });
        return;
      case "/live": {
        // 最新の電文の時刻と積算電力量の合計
        const { summary } = liveData;
        if (!summary) {
          sendJson(res, 503, { error: "No telegram received yet" });
          return;
        }
        sendJson(res, 200, {
          ts: summary.timestamp,
          c: summary.consumption,
          p: summary.production,
        });
        return;
      }
      case "/readings": {
        const { readings } = liveData;
        if (!readings) {
          sendJson(res, 503, { error: "No telegram received yet" });
          return;
        }
        sendJson(res, 200, readings);
        return;
      }
      default:
        sendJson(res, 404, { error: "Not Found" });
    }
  });

  return new Promise((resolve, reject) => {
    server.once("listening", () => {
      logger.info(`listen port: ${env.PORT}`);
      const { port } = server.address() as AddressInfo;
      resolve({
        port,
        close: promisify(server.close.bind(server)),
      });
    });
    server.once("error", (err) => reject(err));
    server.listen(env.PORT);
  });
}
