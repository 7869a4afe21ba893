import type { Settings } from "../../config/settings.js";
import type { Logger } from "../../lib/logger.js";
import { createServices } from "../../services.js";
import type { ParsedCli } from "../parse.js";

export async function runAskCommand(cli: ParsedCli, settings: Settings, logger: Logger): Promise<void> {
  const question = cli.args.join(" ").trim();
  if (!question) {
    throw new Error("Usage: sermon-qa ask <question>");
  }

  const { chat } = createServices(settings, logger);
  const reply = await chat.reply(question);
  process.stdout.write(`${reply.answer}\n`);
}
