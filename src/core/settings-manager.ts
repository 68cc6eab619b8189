import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import chalk from "chalk";
import { getConfigDir, getSettingsPath } from "../config.js";

export const DEFAULT_MODEL = "text-davinci-002-render-sha";
export const DEFAULT_CHAT_LIST_LIMIT = 3;

export const SettingsSchema = Type.Object({
	/** Reverse proxy root; the backend lives at `${baseUrl}/backend-api` */
	baseUrl: Type.Optional(Type.String()),
	backendUrl: Type.Optional(Type.String()),
	accessToken: Type.Optional(Type.String()),
	model: Type.Optional(Type.String()),
	historyAndTrainingDisabled: Type.Optional(Type.Boolean()),
	chatListLimit: Type.Optional(Type.Integer({ minimum: 1 })),
});

export type Settings = Static<typeof SettingsSchema>;

/** Default settings configuration */
const DEFAULT_SETTINGS: Settings = {
	model: DEFAULT_MODEL,
	historyAndTrainingDisabled: false,
	chatListLimit: DEFAULT_CHAT_LIST_LIMIT,
};

export class SettingsManager {
	private settingsPath: string | null;
	private settings: Settings;
	private persist: boolean;

	private constructor(settingsPath: string | null, initialSettings: Settings, persist: boolean) {
		this.settingsPath = settingsPath;
		this.settings = initialSettings;
		this.persist = persist;
	}

	/** Create a SettingsManager that loads from files */
	static create(configDir: string = getConfigDir()): SettingsManager {
		const settingsPath = getSettingsPath(configDir);
		const settings = SettingsManager.loadFromFile(settingsPath);
		const manager = new SettingsManager(settingsPath, settings, true);

		// If settings file doesn't exist, create it with defaults
		if (!existsSync(settingsPath)) {
			manager.settings = { ...DEFAULT_SETTINGS };
			manager.save();
		}

		return manager;
	}

	/** Create an in-memory SettingsManager (no file I/O) */
	static inMemory(settings: Partial<Settings> = {}): SettingsManager {
		return new SettingsManager(null, { ...settings }, false);
	}

	private static loadFromFile(path: string): Settings {
		if (!existsSync(path)) {
			return {};
		}
		let content: unknown;
		try {
			content = JSON.parse(readFileSync(path, "utf-8"));
		} catch (error) {
			console.error(chalk.yellow(`Warning: Could not read settings file ${path}: ${error}`));
			return {};
		}
		if (!Value.Check(SettingsSchema, content)) {
			const first = Value.Errors(SettingsSchema, content).First();
			const where = first ? ` (${first.path || "/"}: ${first.message})` : "";
			console.error(chalk.yellow(`Warning: Ignoring invalid settings file ${path}${where}`));
			return {};
		}
		return content;
	}

	private save(): void {
		if (!this.persist || !this.settingsPath) return;

		try {
			const dir = dirname(this.settingsPath);
			if (!existsSync(dir)) {
				mkdirSync(dir, { recursive: true });
			}

			writeFileSync(this.settingsPath, JSON.stringify(this.settings, null, 2), "utf-8");
		} catch (error) {
			console.error(chalk.yellow(`Warning: Could not save settings file: ${error}`));
		}
	}

	/** Snapshot of the raw settings (unset fields stay undefined) */
	getSettings(): Settings {
		return { ...this.settings };
	}

	getBaseUrl(): string | undefined {
		return this.settings.baseUrl;
	}

	setBaseUrl(baseUrl: string | undefined): void {
		this.settings.baseUrl = baseUrl;
		this.save();
	}

	getBackendUrl(): string | undefined {
		return this.settings.backendUrl;
	}

	setBackendUrl(backendUrl: string | undefined): void {
		this.settings.backendUrl = backendUrl;
		this.save();
	}

	getAccessToken(): string | undefined {
		return this.settings.accessToken;
	}

	setAccessToken(accessToken: string | undefined): void {
		this.settings.accessToken = accessToken;
		this.save();
	}

	getModel(): string {
		return this.settings.model || DEFAULT_MODEL;
	}

	setModel(model: string): void {
		this.settings.model = model;
		this.save();
	}

	getHistoryAndTrainingDisabled(): boolean {
		return this.settings.historyAndTrainingDisabled ?? false;
	}

	setHistoryAndTrainingDisabled(disabled: boolean): void {
		this.settings.historyAndTrainingDisabled = disabled;
		this.save();
	}

	getChatListLimit(): number {
		return this.settings.chatListLimit ?? DEFAULT_CHAT_LIST_LIMIT;
	}

	setChatListLimit(limit: number): void {
		this.settings.chatListLimit = limit;
		this.save();
	}
}
