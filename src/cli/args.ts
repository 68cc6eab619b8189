import chalk from "chalk";
import { APP_NAME, ENV_ACCESS_TOKEN, ENV_BACKEND_URL, ENV_BASE_URL, ENV_CONFIG_DIR } from "../config.js";

export interface Args {
	messages: string[];
	conversation?: string;
	node?: string;
	session?: string;
	save?: boolean;
	output?: string;
	model?: string;
	noHistory?: boolean;
	list?: boolean;
	log?: boolean;
	help?: boolean;
	version?: boolean;
}

export function parseArgs(args: string[]): Args {
	const result: Args = {
		messages: [],
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		if (arg === "--help" || arg === "-h") {
			result.help = true;
		} else if (arg === "--version" || arg === "-v") {
			result.version = true;
		} else if ((arg === "--conversation" || arg === "-c") && i + 1 < args.length) {
			result.conversation = args[++i];
		} else if ((arg === "--node" || arg === "-n") && i + 1 < args.length) {
			result.node = args[++i];
		} else if ((arg === "--session" || arg === "-s") && i + 1 < args.length) {
			result.session = args[++i];
		} else if ((arg === "--output" || arg === "-o") && i + 1 < args.length) {
			result.output = args[++i];
			result.save = true;
		} else if ((arg === "--model" || arg === "-m") && i + 1 < args.length) {
			result.model = args[++i];
		} else if (arg === "--save") {
			result.save = true;
		} else if (arg === "--no-history") {
			result.noHistory = true;
		} else if (arg === "--list" || arg === "-l") {
			result.list = true;
		} else if (arg === "--log") {
			result.log = true;
		} else if (!arg.startsWith("-")) {
			result.messages.push(arg);
		}
	}
	return result;
}

export function printHelp(): void {
	console.log(`${chalk.bold(APP_NAME)} - ask questions and branch conversations from the terminal

${chalk.bold("Usage:")}
  ${APP_NAME} [options] [message...]

${chalk.bold("Options:")}
  --conversation, -c <id>   Resume a remote conversation
  --node, -n <id>           Move to this answer before asking
  --session, -s <file>      Load a saved session snapshot
  --save                    Save the session after asking
  --output, -o <file>       Save the session to this file
  --model, -m <id>          Model to ask with
  --no-history              Disable history and training for new messages
  --list, -l                List recent conversations
  --log                     Print the active path of the conversation
  --version, -v             Print the version
  --help, -h                Show this help

${chalk.bold("Environment:")}
  ${ENV_BASE_URL}       Reverse proxy root (backend at <url>/backend-api)
  ${ENV_BACKEND_URL}    Full backend URL
  ${ENV_ACCESS_TOKEN}   Bearer token
  ${ENV_CONFIG_DIR}            Config directory (default: ~/.${APP_NAME})
`);
}
