import { runConfiguredConversion } from "./pipeline";

async function main(): Promise<void> {
  const result = await runConfiguredConversion();
  console.log(
    `Done: ${result.known} requests, ${result.unknown} unknown, ${result.groups.length} groups`,
  );
}

main().catch((err) => {
  console.error("Conversion failed:", err instanceof Error ? err.message : err);
  process.exit(1);
});
