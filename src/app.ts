import readline from "node:readline/promises";
import { ActionLog } from "./actionLog.ts";
import { RelayBot } from "./bot.ts";
import { appConfig, ensureRuntimeEnv } from "./config.ts";
import { RuntimeActionLogger } from "./runtimeActionLogger.ts";

async function ask(question: string) {
  const prompt = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    return (await prompt.question(question)).trim();
  } finally {
    prompt.close();
  }
}

async function main() {
  ensureRuntimeEnv();

  const log = new ActionLog();
  const runtimeLogger = new RuntimeActionLogger({
    enabled: appConfig.runtimeStructuredLogsEnabled,
    writeToStdout: appConfig.runtimeStructuredLogsStdout,
    logFilePath: appConfig.runtimeStructuredLogsFilePath
  });
  runtimeLogger.attachTo(log);

  const bot = new RelayBot({
    appConfig,
    log,
    prompts: {
      phoneNumber: () => ask("Phone number of the search account: "),
      phoneCode: () => ask("Login code sent by Telegram: "),
      password: () => ask("Two-step verification password: ")
    }
  });

  await bot.start();

  let closing = false;
  const shutdown = async (signal: string) => {
    if (closing) return;
    closing = true;

    const { inFlightTasks } = bot.getRuntimeState();
    console.log(`Shutting down (${signal}), draining ${inFlightTasks} task(s)...`);

    try {
      await bot.stop();
    } catch (error) {
      console.error("Bot shutdown failed:", error);
    }

    runtimeLogger.close();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((error) => {
  console.error("Fatal startup error:", error);
  process.exit(1);
});
