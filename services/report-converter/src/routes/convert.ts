import { Hono } from "hono";
import { runConfiguredConversion } from "../pipeline";
import type { ConversionResult } from "../convert";

const convertRoute = new Hono();

// Runs share output paths, so only one may be in flight at a time.
let inFlight: Promise<ConversionResult> | null = null;

convertRoute.post("/convert", async (c) => {
  if (inFlight) {
    return c.json({ error: "Conversion already in progress" }, 409);
  }

  inFlight = runConfiguredConversion();
  try {
    const result = await inFlight;
    return c.json(result, 200);
  } catch (err) {
    console.error("Conversion failed:", err);
    return c.json({ error: (err as Error).message }, 500);
  } finally {
    inFlight = null;
  }
});

export { convertRoute };
