import { runLeaseCli } from "./lease-cli.js";

const run = async () => {
  const result = await runLeaseCli();
  if ("skipped" in result) {
    console.log("Cancelled.");
    return;
  }
  if (!result.found) {
    console.log(`No reservation stored for asset ${result.assetId}.`);
    return;
  }
  const status = result.released ? "Released" : "Already gone";
  console.log(`${status}: asset ${result.assetId} (holder: ${result.holder})`);
};

run().catch((error) => {
  console.error("Failed to release reservation:", error);
  process.exitCode = 1;
});
