import "dotenv/config";
import path from "node:path";
import process from "node:process";
import { JsonFileStore, OllamaClient, loadConfig, setLogLevel } from "@boardchat/sdk";
import { parseArgs, pickModel, renderReply, runDemo } from "./demo";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const store = await JsonFileStore.open(path.resolve(args.dataPath ?? config.dataPath));
  const { model, message } = await pickModel({
    ask: args.ask,
    client: OllamaClient.fromConfig(config),
  });

  const result = await runDemo({ store, model, message, timeoutMs: config.llmTimeoutMs });
  process.stdout.write(`user: ${message}\n`);
  process.stdout.write(renderReply(result.reply) + "\n\n");
  process.stdout.write(result.board + "\n");
  process.stdout.write(`\nstate saved to ${store.filePath}\n`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
