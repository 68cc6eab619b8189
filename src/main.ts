import chalk from "chalk";
import { type Args, parseArgs, printHelp } from "./cli/args.js";
import { createChatSession } from "./core/sdk.js";
import { VERSION } from "./config.js";
import { runPrintMode } from "./modes/print-mode.js";

export async function main(args: string[]): Promise<void> {
	const parsed: Args = parseArgs(args);

	if (parsed.help) {
		printHelp();
		return;
	}

	if (parsed.version) {
		console.log(VERSION);
		return;
	}

	const nothingToDo = parsed.messages.length === 0 && !parsed.list && !parsed.log && !parsed.save;
	if (nothingToDo && !parsed.conversation && !parsed.session) {
		printHelp();
		return;
	}

	const { session } = await createChatSession({
		model: parsed.model,
		historyAndTrainingDisabled: parsed.noHistory ? true : undefined,
		conversationId: parsed.conversation,
		currentAnswerId: parsed.node,
		sessionFile: parsed.session,
	});

	await runPrintMode(session, {
		messages: parsed.messages,
		list: parsed.list,
		log: parsed.log,
	});

	if (parsed.save) {
		const path = session.save(parsed.output);
		console.error(chalk.dim(`Session saved to ${path}`));
	}
}
