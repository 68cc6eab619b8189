import { describe, it, expect, expectTypeOf, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { ReadonlyChatNode } from '../src/core/chat-node.js';
import { ChatSession } from '../src/core/chat-session.js';
import {
	AtRootError,
	ConfigurationError,
	ConversationLockedError,
	DuplicateNodeError,
	EmptySessionError,
	InvalidMessageError,
	InvalidTargetError,
	MalformedTreeError,
	RemoteCallError,
	UnknownNodeError,
} from '../src/core/errors.js';
import { FakeBackend, branchedConversation } from './helpers/fake-backend.js';

describe('ChatSession', () => {
	let backend: FakeBackend;
	let testDir: string;
	let session: ChatSession;

	beforeEach(() => {
		testDir = join(tmpdir(), `chat-session-test-${Date.now()}-${Math.random()}`);
		mkdirSync(testDir, { recursive: true });
		backend = new FakeBackend();
		session = new ChatSession(backend, { sessionsDir: testDir });
	});

	afterEach(() => {
		if (existsSync(testDir)) {
			rmSync(testDir, { recursive: true, force: true });
		}
	});

	describe('constructor', () => {
		it('should reject a backend without an access token', () => {
			class NoTokenBackend extends FakeBackend {
				readonly accessToken: string = '';
			}
			expect(() => new ChatSession(new NoTokenBackend())).toThrow(ConfigurationError);
		});

		it('should start empty with default options', () => {
			expect(session.isEmpty).toBe(true);
			expect(session.store.size).toBe(0);
			expect(session.conversationId).toBeNull();
			expect(session.model).toBe('text-davinci-002-render-sha');
			expect(session.chatListLimit).toBe(3);
			expect(session.toString()).toBe('<ChatSession: (none)>');
		});
	});

	describe('ask()', () => {
		it('should build the anchor, root, question and answer on the first turn', async () => {
			const reply = await session.ask('hello');

			expect(reply).toBe('reply to: hello');
			expect(session.conversationId).toBe('conv-1');
			expect(session.store.size).toBe(4);
			expect(session.rootId).toBe('root-1');
			expect(session.currentAnswerId).toBe('answer-1');

			const request = backend.completions[0];
			expect(request.parentMessageId).toBe(session.treeId);
			expect(request.conversationId).toBeUndefined();
			expect(session.currentQuestionId).toBe(request.messageId);

			const treeId = session.treeId ?? '';
			expect(session.store.get(treeId).message).toBeNull();
			expect(session.store.get(treeId).children).toEqual(['root-1']);
			expect(session.store.get('root-1').parent).toBe(treeId);
			expect(session.store.get(request.messageId).message).toBe('hello');
			expect(session.toString()).toBe('<ChatSession: conv-1>');
		});

		it('should hold 2n + 2 nodes after n asks', async () => {
			await session.ask('one');
			await session.ask('two');
			await session.ask('three');

			expect(session.store.size).toBe(8);
			expect(session.currentAnswerId).toBe('answer-3');
		});

		it('should continue from the current answer with the conversation id', async () => {
			await session.ask('hello');
			await session.ask('again');

			const request = backend.completions[1];
			expect(request.parentMessageId).toBe('answer-1');
			expect(request.conversationId).toBe('conv-1');
			expect(session.store.get('answer-1').children).toEqual([request.messageId]);
		});

		it('should reject a blank message', async () => {
			await expect(session.ask('   ')).rejects.toThrow(InvalidMessageError);
			expect(backend.completions).toHaveLength(0);
		});

		it('should leave the session untouched when the completion fails', async () => {
			await session.ask('hello');
			const before = session.toSnapshot();

			backend.failNext = new RemoteCallError('POST /conversation failed: HTTP 500: oops', { statusCode: 500 });
			await expect(session.ask('again')).rejects.toThrow(RemoteCallError);

			expect(session.toSnapshot()).toEqual(before);
		});

		it('should keep accepting asks after a failed one', async () => {
			backend.failNext = new RemoteCallError('network down');
			await expect(session.ask('hello')).rejects.toThrow('network down');

			expect(await session.ask('hello')).toBe('reply to: hello');
			expect(session.store.size).toBe(4);
		});

		it('should leave the session untouched when the answer id collides', async () => {
			await session.ask('hello');
			const before = session.toSnapshot();

			backend.nextAnswerId = 'answer-1';
			await expect(session.ask('again')).rejects.toThrow(DuplicateNodeError);

			expect(session.toSnapshot()).toEqual(before);
			expect(session.store.get('answer-1').children).toHaveLength(1);
		});

		it('should stay empty when the first-turn frames share an id', async () => {
			backend.nextAnswerId = 'root-1';
			await expect(session.ask('hello')).rejects.toThrow(DuplicateNodeError);

			expect(session.isEmpty).toBe(true);
			expect(session.store.size).toBe(0);
			expect(session.conversationId).toBeNull();
		});

		it('should return the answer without recording it when keep is false', async () => {
			await session.ask('hello');
			const before = session.toSnapshot();

			const reply = await session.ask('peek', { keep: false });

			expect(reply).toBe('reply to: peek');
			expect(session.toSnapshot()).toEqual(before);
		});

		it('should not bind a conversation when keep is false on an empty session', async () => {
			expect(await session.ask('peek', { keep: false })).toBe('reply to: peek');
			expect(session.isEmpty).toBe(true);
			expect(session.conversationId).toBeNull();
		});

		it('should run concurrent asks one after another', async () => {
			await Promise.all([session.ask('one'), session.ask('two')]);

			expect(backend.completions[1].parentMessageId).toBe('answer-1');
			expect(backend.completions[1].conversationId).toBe('conv-1');
			expect(session.currentAnswerId).toBe('answer-2');
		});
	});

	describe('navigation', () => {
		it('should go back to the root and then refuse to go further', async () => {
			await session.ask('hello');

			session.goback();
			expect(session.currentAnswerId).toBe('root-1');
			expect(session.currentQuestionId).toBe(session.treeId);

			expect(() => session.goback()).toThrow(AtRootError);
		});

		it('should branch when asking after going back', async () => {
			await session.ask('hello');
			await session.ask('again');
			const firstBranch = backend.completions[1].messageId;

			session.goback();
			expect(session.currentAnswerId).toBe('answer-1');
			await session.ask('instead');

			expect(session.branchesOf('answer-1')).toEqual([firstBranch, backend.completions[2].messageId]);
			expect(session.store.size).toBe(8);
		});

		it('should refuse goback on an empty session', () => {
			expect(() => session.goback()).toThrow(EmptySessionError);
		});

		it('should reject the anchor, questions and unknown ids as goto targets', async () => {
			await session.ask('hello');
			const treeId = session.treeId ?? '';
			const questionId = session.currentQuestionId ?? '';

			expect(() => session.goto(treeId)).toThrow(InvalidTargetError);
			expect(() => session.goto(questionId)).toThrow(InvalidTargetError);
			expect(() => session.goto('nope')).toThrow(UnknownNodeError);
			expect(session.currentAnswerId).toBe('answer-1');
		});

		it('should pair an answer with the question that produced it', async () => {
			await session.ask('hello');
			await session.ask('again');
			const firstQuestion = backend.completions[0].messageId;

			session.goto('answer-1');

			expect(session.currentAnswerId).toBe('answer-1');
			expect(session.currentQuestionId).toBe(firstQuestion);
		});

		it('should list the active path as a chat log', async () => {
			await session.ask('hello');
			await session.ask('again');

			const log = session.chatLog();

			expect(log.map((entry) => entry.role)).toEqual(['root', 'question', 'answer', 'question', 'answer']);
			expect(log.map((entry) => entry.message)).toEqual(['', 'hello', 'reply to: hello', 'again', 'reply to: again']);
		});

		it('should return an empty chat log for an empty session', () => {
			expect(session.chatLog()).toEqual([]);
		});
	});

	describe('regenerate()', () => {
		it('should ask the current question again as a sibling branch', async () => {
			await session.ask('hello');
			await session.ask('again');
			const original = backend.completions[1].messageId;

			const reply = await session.regenerate();

			expect(reply).toBe('reply to: again');
			expect(backend.completions[2].parentMessageId).toBe('answer-1');
			expect(session.branchesOf('answer-1')).toEqual([original, backend.completions[2].messageId]);
			expect(session.currentAnswerId).toBe('answer-3');
		});

		it('should send an edited question in place of the current one', async () => {
			await session.ask('hello');

			expect(await session.regenerate('hi there')).toBe('reply to: hi there');
			expect(session.branchesOf('root-1')).toHaveLength(2);
		});

		it('should refuse to regenerate on an empty session or at the root', async () => {
			await expect(session.regenerate()).rejects.toThrow(EmptySessionError);

			await session.ask('hello');
			session.goto('root-1');
			await expect(session.regenerate()).rejects.toThrow(AtRootError);
		});

		it('should refuse to regenerate a question with no text', async () => {
			const conversation = branchedConversation();
			conversation.mapping.q1 = { id: 'q1', message: '', parent: 'r', children: ['x1', 'x2'] };
			backend.conversations.set('conv-9', conversation);
			const opened = await ChatSession.open(backend, 'conv-9');

			await expect(opened.regenerate()).rejects.toThrow(InvalidMessageError);
			expect(backend.completions).toHaveLength(0);
			expect(opened.branchesOf('q1')).toEqual(['x1', 'x2']);
		});
	});

	describe('remote sync', () => {
		beforeEach(() => {
			backend.conversations.set('conv-9', branchedConversation());
		});

		it('should open a remote conversation at the declared current node', async () => {
			const opened = await ChatSession.open(backend, 'conv-9');

			expect(opened.conversationId).toBe('conv-9');
			expect(opened.treeId).toBe('a0');
			expect(opened.rootId).toBe('r');
			expect(opened.currentQuestionId).toBe('q1');
			expect(opened.currentAnswerId).toBe('x1');
		});

		it('should walk from a declared question to its latest answer', async () => {
			const conversation = branchedConversation();
			conversation.current_node = 'q1';
			backend.conversations.set('conv-9', conversation);

			const opened = await ChatSession.open(backend, 'conv-9');

			expect(opened.currentQuestionId).toBe('q1');
			expect(opened.currentAnswerId).toBe('x2');
		});

		it('should expose nodes without their mutators', async () => {
			const opened = await ChatSession.open(backend, 'conv-9');

			expectTypeOf(opened.store.get('x1')).toEqualTypeOf<ReadonlyChatNode>();
			expectTypeOf<ReadonlyChatNode>().not.toHaveProperty('appendChild');
			expect(opened.store.get('x1').children).toEqual([]);
		});

		it('should move to a requested answer after opening', async () => {
			const opened = await ChatSession.open(backend, 'conv-9', { currentAnswerId: 'x2' });

			expect(opened.currentAnswerId).toBe('x2');
			expect(opened.currentQuestionId).toBe('q1');
		});

		it('should continue a synced conversation from its current answer', async () => {
			const opened = await ChatSession.open(backend, 'conv-9');
			await opened.ask('tell me more');

			const request = backend.completions[0];
			expect(request.parentMessageId).toBe('x1');
			expect(request.conversationId).toBe('conv-9');
			expect(opened.store.get('x1').children).toEqual([request.messageId]);
		});

		it('should replace local state with a fresh copy', async () => {
			const opened = await ChatSession.open(backend, 'conv-9');
			const updated = branchedConversation();
			updated.current_node = 'x2';
			backend.conversations.set('conv-9', updated);

			await opened.syncFromRemote();

			expect(opened.currentAnswerId).toBe('x2');
			expect(opened.store.size).toBe(5);
		});

		it('should refuse to sync a different conversation into a bound session', async () => {
			await session.ask('hello');

			await expect(session.syncFromRemote('conv-9')).rejects.toThrow(ConversationLockedError);
			expect(session.conversationId).toBe('conv-1');
		});

		it('should need a conversation id to sync', async () => {
			await expect(session.syncFromRemote()).rejects.toThrow(EmptySessionError);
		});

		it('should expose the normalized mapping', async () => {
			const mapping = await session.mappingById('conv-9');

			expect([...mapping.keys()]).toEqual(['a0', 'r', 'q1', 'x1', 'x2']);
			expect(mapping.get('q1')?.message).toBe('what is a tree?');
			expect(mapping.get('a0')?.message).toBeNull();
		});
	});

	describe('account helpers', () => {
		it('should return the account plan', async () => {
			expect(await session.accountStatus()).toEqual({ is_paid_subscription_active: false, subscription_plan: 'free' });
		});

		it('should list model categories', async () => {
			expect(await session.validModels()).toEqual(['fast', 'smart']);
			expect(backend.calls).toEqual([{ method: 'getModels', args: [false] }]);
		});

		it('should page the chat list with the configured limit', async () => {
			const chats = await session.chatList();

			expect(chats).toEqual([
				{ conversationId: 'c1', title: 'First chat' },
				{ conversationId: 'c2', title: '' },
			]);
			expect(backend.calls).toEqual([{ method: 'getChatList', args: [{ offset: 0, limit: 3, order: 'updated' }] }]);
		});

		it('should report the total number of chats', async () => {
			expect(await session.numOfChats()).toBe(7);
		});

		it('should default title and delete operations to the bound conversation', async () => {
			await session.ask('hello');

			await session.editTitle('Renamed');
			await session.generateTitle();
			await session.deleteChat('other');

			expect(backend.calls).toEqual([
				{ method: 'editChatTitle', args: ['conv-1', 'Renamed'] },
				{ method: 'generateChatTitle', args: ['conv-1', 'answer-1'] },
				{ method: 'deleteChat', args: ['other'] },
			]);
		});

		it('should need a conversation for id-taking helpers', async () => {
			await expect(session.editTitle('Renamed')).rejects.toThrow(EmptySessionError);
			await expect(session.deleteChat()).rejects.toThrow(EmptySessionError);
		});
	});

	describe('persistence', () => {
		it('should restore the same nodes and pointers from a saved file', async () => {
			await session.ask('hello');
			await session.ask('again');
			session.goback();

			const path = session.save();
			expect(path).toBe(join(testDir, 'conv-1.json'));

			const loaded = ChatSession.load(backend, path);

			expect(loaded.toSnapshot()).toEqual(session.toSnapshot());
			expect(loaded.currentAnswerId).toBe('answer-1');
			expect(loaded.conversationId).toBe('conv-1');
		});

		it('should write to an explicit path', async () => {
			await session.ask('hello');
			const path = session.save(join(testDir, 'nested', 'mine.json'));

			expect(existsSync(path)).toBe(true);
		});

		it('should refuse to save an unbound session without a path', () => {
			expect(() => session.save()).toThrow(EmptySessionError);
		});

		it('should round-trip an empty session', () => {
			const restored = ChatSession.fromSnapshot(backend, session.toSnapshot());

			expect(restored.isEmpty).toBe(true);
			expect(restored.store.size).toBe(0);
		});

		it('should reject a snapshot that points at the anchor as its answer', () => {
			const snapshot = {
				conversationId: 'c1',
				treeId: 't',
				rootId: 'r',
				currentQuestionId: 'r',
				currentAnswerId: 't',
				nodes: [
					{ id: 't', message: null, parent: null, children: ['r'] },
					{ id: 'r', message: '', parent: 't', children: [] },
				],
			};

			expect(() => ChatSession.fromSnapshot(backend, snapshot)).toThrow(MalformedTreeError);
		});

		it('should reject a snapshot with the wrong shape', () => {
			expect(() => ChatSession.fromSnapshot(backend, { nodes: 'nope' })).toThrow(MalformedTreeError);
		});
	});
});
