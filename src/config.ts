import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { dirname, join } from "path";
import { fileURLToPath } from "url";
import chalk from "chalk";

// =============================================================================
// Package Detection
// =============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Get the package root.
 * - For Node.js (dist/): walks up from the dist/ directory
 * - For vitest/tsx (src/): walks up from src/
 */
export function getPackageDir(): string {
	let dir = __dirname;
	while (dir !== dirname(dir)) {
		if (existsSync(join(dir, "package.json"))) {
			return dir;
		}
		dir = dirname(dir);
	}
	// Fallback (shouldn't happen)
	return __dirname;
}

/** Get path to package.json */
export function getPackageJsonPath(): string {
	return join(getPackageDir(), "package.json");
}

// =============================================================================
// App Config (from package.json webchatConfig)
// =============================================================================

interface PackageJson {
	webchatConfig?: { name?: string; configDir?: string };
	version?: string;
}

function loadPackageJson(): PackageJson {
	try {
		const packageJsonPath = getPackageJsonPath();
		if (!existsSync(packageJsonPath)) {
			console.error(chalk.yellow(`Warning: package.json not found at ${packageJsonPath}. Using default configuration.`));
			return {};
		}
		const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, "utf-8"));
		if (typeof parsed !== "object" || parsed === null) return {};
		const version = "version" in parsed && typeof parsed.version === "string" ? parsed.version : undefined;
		const config: object =
			"webchatConfig" in parsed && typeof parsed.webchatConfig === "object" && parsed.webchatConfig !== null
				? parsed.webchatConfig
				: {};
		return {
			version,
			webchatConfig: {
				name: "name" in config && typeof config.name === "string" ? config.name : undefined,
				configDir: "configDir" in config && typeof config.configDir === "string" ? config.configDir : undefined,
			},
		};
	} catch (error) {
		console.error(chalk.yellow(`Warning: Failed to read package.json: ${error}. Using default configuration.`));
		return {};
	}
}

const pkg = loadPackageJson();

export const APP_NAME: string = pkg.webchatConfig?.name || "webchat";
export const CONFIG_DIR_NAME: string = pkg.webchatConfig?.configDir || ".webchat";
export const VERSION: string = pkg.version || "0.0.0";

// e.g., WEBCHAT_DIR, WEBCHAT_ACCESS_TOKEN
const ENV_PREFIX = APP_NAME.toUpperCase().replace(/[^A-Z0-9]/g, "_");
export const ENV_CONFIG_DIR = `${ENV_PREFIX}_DIR`;
export const ENV_BASE_URL = `${ENV_PREFIX}_BASE_URL`;
export const ENV_BACKEND_URL = `${ENV_PREFIX}_BACKEND_URL`;
export const ENV_ACCESS_TOKEN = `${ENV_PREFIX}_ACCESS_TOKEN`;

// Names used by existing reverse-proxy setups
export const LEGACY_ENV_BASE_URL = "API_REVERSE_PROXY";
export const LEGACY_ENV_ACCESS_TOKEN = "OPENAI_ACCESS_TOKEN";

// =============================================================================
// User Config Paths (~/.webchat/*)
// =============================================================================

/** Get the config directory (e.g., ~/.webchat/) */
export function getConfigDir(): string {
	return process.env[ENV_CONFIG_DIR] || join(homedir(), CONFIG_DIR_NAME);
}

/** Get path to settings.json */
export function getSettingsPath(configDir: string = getConfigDir()): string {
	return join(configDir, "settings.json");
}

/** Get path to sessions directory */
export function getSessionsDir(configDir: string = getConfigDir()): string {
	return join(configDir, "sessions");
}
