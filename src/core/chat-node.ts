/**
 * ChatNode - one element of a conversation tree.
 *
 * Nodes come from two places:
 * - the backend, where the text sits under `message.content.parts`
 * - the session itself, which synthesizes question and anchor nodes
 *   already in the flat `{ id, message, parent, children }` shape
 *
 * Both go through `normalizeNode` so the rest of the tree only sees NodeRecord.
 */

import { type Static, Type } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { MalformedNodeError } from "./errors.js";

// ============================================================================
// Schemas
// ============================================================================

/** Message object as the backend nests it inside a node */
export const RawMessageSchema = Type.Object({
	id: Type.Optional(Type.String()),
	author: Type.Optional(Type.Object({ role: Type.Optional(Type.String()) })),
	content: Type.Optional(
		Type.Object({
			content_type: Type.Optional(Type.String()),
			parts: Type.Optional(Type.Array(Type.Unknown())),
			text: Type.Optional(Type.String()),
		}),
	),
});

export const RawNodeSchema = Type.Object({
	id: Type.Optional(Type.String()),
	message: Type.Optional(Type.Union([Type.Null(), Type.String(), RawMessageSchema])),
	parent: Type.Optional(Type.Union([Type.String(), Type.Null()])),
	children: Type.Optional(Type.Union([Type.Array(Type.String()), Type.Null()])),
});

/** Flat, normalized node shape (also the persisted shape) */
export const NodeRecordSchema = Type.Object({
	id: Type.String(),
	message: Type.Union([Type.String(), Type.Null()]),
	parent: Type.Union([Type.String(), Type.Null()]),
	children: Type.Array(Type.String()),
});

export type RawMessage = Static<typeof RawMessageSchema>;
export type RawNode = Static<typeof RawNodeSchema>;
export type NodeRecord = Static<typeof NodeRecordSchema>;

// ============================================================================
// Normalization
// ============================================================================

function extractText(message: RawMessage): string {
	const parts = message.content?.parts;
	if (parts && parts.length > 0) {
		const first = parts[0];
		return typeof first === "string" ? first : JSON.stringify(first);
	}
	// Non-text content types (code, tether quotes) carry a single text field
	return message.content?.text ?? "";
}

export interface NormalizeOptions {
	/** Used when neither the node nor its message carries an id (mapping keys) */
	fallbackId?: string;
}

/**
 * Flatten a raw node into a NodeRecord.
 * Takes exactly the first content part as the text.
 */
export function normalizeNode(raw: unknown, options: NormalizeOptions = {}): NodeRecord {
	if (!Value.Check(RawNodeSchema, raw)) {
		const first = Value.Errors(RawNodeSchema, raw).First();
		const where = first ? ` at '${first.path || "/"}': ${first.message}` : "";
		throw new MalformedNodeError(`Raw node has an unexpected shape${where}`);
	}

	const rawMessage = raw.message;
	let message: string | null = null;
	let messageId: string | undefined;
	if (typeof rawMessage === "string") {
		message = rawMessage;
	} else if (rawMessage) {
		message = extractText(rawMessage);
		messageId = rawMessage.id;
	}

	const id = raw.id || messageId || options.fallbackId;
	if (!id) {
		throw new MalformedNodeError("Raw node has neither an id nor a message id");
	}

	return {
		id,
		message,
		parent: raw.parent ?? null,
		children: raw.children ? [...raw.children] : [],
	};
}

// ============================================================================
// ChatNode
// ============================================================================

/** Query-only view of a node; children change only through TreeStore.linkChild */
export interface ReadonlyChatNode {
	readonly id: string;
	readonly message: string | null;
	readonly parent: string | null;
	readonly children: readonly string[];
	hasMessage(): boolean;
	equals(other: ReadonlyChatNode): boolean;
	toJSON(): NodeRecord;
}

export class ChatNode implements ReadonlyChatNode {
	readonly id: string;
	readonly message: string | null;
	readonly parent: string | null;
	private readonly _children: string[];

	constructor(record: NodeRecord) {
		this.id = record.id;
		this.message = record.message;
		this.parent = record.parent;
		this._children = [...record.children];
	}

	static from(raw: unknown, options?: NormalizeOptions): ChatNode {
		return new ChatNode(normalizeNode(raw, options));
	}

	/** Child ids, oldest branch first */
	get children(): readonly string[] {
		return this._children;
	}

	/** Structural nodes (the tree anchor) have no message */
	hasMessage(): boolean {
		return this.message !== null;
	}

	/**
	 * Attach a new branch. Children are append-only.
	 * Returns false when the child was already attached.
	 */
	appendChild(childId: string): boolean {
		if (this._children.includes(childId)) return false;
		this._children.push(childId);
		return true;
	}

	equals(other: ReadonlyChatNode): boolean {
		return (
			this.id === other.id &&
			this.message === other.message &&
			this.parent === other.parent &&
			this._children.length === other.children.length &&
			this._children.every((child, i) => child === other.children[i])
		);
	}

	toJSON(): NodeRecord {
		return {
			id: this.id,
			message: this.message,
			parent: this.parent,
			children: [...this._children],
		};
	}

	toString(): string {
		const parent = this.parent ? this.parent.slice(0, 8) : "tree";
		const children = this._children.map((c) => c.slice(0, 8)).join(", ");
		return `<ChatNode: ${parent} -|- [${children}]>`;
	}
}
