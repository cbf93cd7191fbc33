import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { getConfig } from "./config";
import { health } from "./routes/health";
import { convertRoute } from "./routes/convert";

const app = new Hono();

app.route("/", health);
app.route("/", convertRoute);

const config = getConfig();
serve({ fetch: app.fetch, port: config.PORT }, (info) => {
  console.log(
    `Report converter ready on :${info.port}, POST /convert reads ${config.REPORT_PATH} and writes to ${config.OUTPUT_DIR}`,
  );
});

process.on("SIGTERM", () => {
  console.log("SIGTERM received, exiting report converter");
  process.exit(0);
});

export { app };
