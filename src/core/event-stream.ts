/**
 * Splitting of the completion endpoint's event-stream body.
 *
 * The body is a run of `data: {json}` frames terminated by `data: [DONE]`.
 * Only the last two JSON frames matter: on a first turn they are the root
 * acknowledgement and the final answer, on later turns the first is ignored.
 */

import { RemoteCallError } from "./errors.js";

const DONE_SENTINEL = "[DONE]";

/** Split a raw event-stream body into trimmed, non-empty `data:` payloads */
export function splitEventStream(body: string): string[] {
	return body
		.split("data:")
		.map((frame) => frame.trim())
		.filter((frame) => frame.length > 0 && frame !== DONE_SENTINEL);
}

/**
 * Parse the second-to-last and last frames of a completion stream.
 */
export function lastTwoFrames(body: string): [unknown, unknown] {
	const frames = splitEventStream(body);
	if (frames.length < 2) {
		throw new RemoteCallError(`Completion stream too short: expected 2 data frames, got ${frames.length}`);
	}
	return [parseFrame(frames[frames.length - 2]), parseFrame(frames[frames.length - 1])];
}

function parseFrame(frame: string): unknown {
	try {
		return JSON.parse(frame);
	} catch (error) {
		throw new RemoteCallError(`Completion stream frame is not valid JSON: ${frame.slice(0, 80)}`, {
			cause: error,
		});
	}
}
