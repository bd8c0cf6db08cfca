import { buildApp } from "./app.js";
import { preload } from "./main.js";

// Single-process server for local development
const app = await buildApp({ buildInfo: await preload() });

const port = parseInt(process.env.PORT || "8632", 10);
const host = process.env.HOST || "0.0.0.0";

try {
  await app.listen({ port, host });
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
