import { describe, it, expect } from 'vitest';
import { ChatNode, normalizeNode } from '../src/core/chat-node.js';
import { MalformedNodeError } from '../src/core/errors.js';

describe('normalizeNode', () => {
	it('should take exactly the first content part', () => {
		const record = normalizeNode({
			id: 'n1',
			message: { id: 'n1', content: { content_type: 'text', parts: ['first', 'second'] } },
			parent: 'p',
			children: ['c'],
		});

		expect(record).toEqual({ id: 'n1', message: 'first', parent: 'p', children: ['c'] });
	});

	it('should encode a non-string first part as JSON', () => {
		const record = normalizeNode({ id: 'n1', message: { content: { parts: [{ kind: 'image', n: 1 }] } } });

		expect(record.message).toBe('{"kind":"image","n":1}');
	});

	it('should fall back to content.text and then to an empty string', () => {
		expect(normalizeNode({ id: 'a', message: { content: { content_type: 'code', text: 'print(1)' } } }).message).toBe(
			'print(1)',
		);
		expect(normalizeNode({ id: 'b', message: { content: { parts: [] } } }).message).toBe('');
	});

	it('should pass string and missing messages through', () => {
		expect(normalizeNode({ id: 'a', message: 'plain' }).message).toBe('plain');
		expect(normalizeNode({ id: 'b' }).message).toBeNull();
		expect(normalizeNode({ id: 'c', message: null }).message).toBeNull();
	});

	it('should default parent and children', () => {
		expect(normalizeNode({ id: 'a', children: null })).toEqual({ id: 'a', message: null, parent: null, children: [] });
	});

	it('should resolve the id from the message, then the fallback', () => {
		expect(normalizeNode({ message: { id: 'from-message', content: { parts: ['x'] } } }).id).toBe('from-message');
		expect(normalizeNode({ message: null }, { fallbackId: 'key' }).id).toBe('key');
	});

	it('should reject a node without any id', () => {
		expect(() => normalizeNode({ message: null })).toThrow(MalformedNodeError);
	});

	it('should reject values of the wrong shape', () => {
		expect(() => normalizeNode('not a node')).toThrow(MalformedNodeError);
		expect(() => normalizeNode({ id: 'a', children: 'c' })).toThrow(MalformedNodeError);
	});
});

describe('ChatNode', () => {
	it('should append children once, in order', () => {
		const node = new ChatNode({ id: 'a', message: 'hi', parent: null, children: [] });

		expect(node.appendChild('c1')).toBe(true);
		expect(node.appendChild('c2')).toBe(true);
		expect(node.appendChild('c1')).toBe(false);
		expect(node.children).toEqual(['c1', 'c2']);
	});

	it('should not share the children array with its record', () => {
		const record = { id: 'a', message: 'hi', parent: null, children: ['c1'] };
		const node = new ChatNode(record);
		node.appendChild('c2');

		expect(record.children).toEqual(['c1']);
		expect(node.toJSON().children).toEqual(['c1', 'c2']);
	});

	it('should compare by value', () => {
		const a = ChatNode.from({ id: 'a', message: 'hi', parent: 'p', children: ['c'] });
		const b = new ChatNode({ id: 'a', message: 'hi', parent: 'p', children: ['c'] });
		const c = new ChatNode({ id: 'a', message: 'hi', parent: 'p', children: [] });

		expect(a.equals(b)).toBe(true);
		expect(a.equals(c)).toBe(false);
	});

	it('should render parent and children prefixes', () => {
		const root = new ChatNode({ id: 'r', message: null, parent: null, children: ['0123456789'] });
		const child = new ChatNode({ id: 'x', message: 'hi', parent: 'abcdefghijk', children: [] });

		expect(root.toString()).toBe('<ChatNode: tree -|- [01234567]>');
		expect(child.toString()).toBe('<ChatNode: abcdefgh -|- []>');
		expect(root.hasMessage()).toBe(false);
		expect(child.hasMessage()).toBe(true);
	});
});
