import {
	ENV_ACCESS_TOKEN,
	ENV_BACKEND_URL,
	ENV_BASE_URL,
	LEGACY_ENV_ACCESS_TOKEN,
	LEGACY_ENV_BASE_URL,
} from "../config.js";
import { ConfigurationError } from "./errors.js";
import type { Settings } from "./settings-manager.js";

export interface ConnectionOptions {
	baseUrl?: string;
	backendUrl?: string;
	accessToken?: string;
}

export interface Connection {
	backendUrl: string;
	accessToken: string;
}

type Env = Record<string, string | undefined>;

function firstSet(...values: Array<string | undefined>): string | undefined {
	return values.find((value) => value !== undefined && value.trim().length > 0);
}

/**
 * Resolve where to connect and with which token.
 * Priority: explicit options > environment > settings file.
 * An explicit backend URL wins over one derived from a base URL.
 */
export function resolveConnection(
	options: ConnectionOptions = {},
	settings: Settings = {},
	env: Env = process.env,
): Connection {
	const explicitBackend = firstSet(options.backendUrl, env[ENV_BACKEND_URL], settings.backendUrl);
	const baseUrl = firstSet(options.baseUrl, env[ENV_BASE_URL], env[LEGACY_ENV_BASE_URL], settings.baseUrl);
	const accessToken = firstSet(options.accessToken, env[ENV_ACCESS_TOKEN], env[LEGACY_ENV_ACCESS_TOKEN], settings.accessToken);

	const backendUrl = explicitBackend ?? (baseUrl ? `${baseUrl.replace(/\/+$/, "")}/backend-api` : undefined);
	if (!backendUrl) {
		throw new ConfigurationError(
			`No backend configured. Set ${ENV_BASE_URL} (or ${ENV_BACKEND_URL}), or baseUrl in settings.json.`,
		);
	}
	if (!accessToken) {
		throw new ConfigurationError(`No access token configured. Set ${ENV_ACCESS_TOKEN}, or accessToken in settings.json.`);
	}

	return { backendUrl: backendUrl.replace(/\/+$/, ""), accessToken };
}
