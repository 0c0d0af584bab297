import { describe, expect, it } from 'vitest';

import { CollectionId } from '../src/ids/collection-id.js';
import { DocumentId } from '../src/ids/document-id.js';
import { CollectionName } from '../src/name/collection-name.js';
import { DatabaseName } from '../src/name/database-name.js';
import { DocumentName } from '../src/name/document-name.js';
import { RootDocumentName } from '../src/name/root-document-name.js';
import { CollectionPath } from '../src/path/collection-path.js';
import { DocumentPath } from '../src/path/document-path.js';
import { catchPathError, ROOT } from './helpers.js';

describe('DocumentName', () => {
	it('round-trips', () => {
		const s = `${ROOT}/chatrooms/chatroom1`;
		expect(DocumentName.parse(s).toString()).toBe(s);
		expect(DocumentName.parse(s).isEqual(DocumentName.parse(s))).toBe(true);
	});

	it('accepts an even, non-zero number of relative segments', () => {
		expect(DocumentName.parse(`${ROOT}/c/d`).toString()).toBe(`${ROOT}/c/d`);
		expect(DocumentName.parse(`${ROOT}/c/d/c/d`).toString()).toBe(`${ROOT}/c/d/c/d`);
		for (const s of [ROOT, `${ROOT}/c`, `${ROOT}/c/d/c`]) {
			expect(catchPathError(() => DocumentName.parse(s)).kind).toBe(
				'invalidNumberOfPathComponents'
			);
		}
	});

	it('enforces the 6144 byte limit', () => {
		const segments = [
			'x'.repeat(1500),
			'x'.repeat(1500),
			'y'.repeat(1500),
			'y'.repeat(1500),
			'z'.repeat(80)
		];
		const atLimit = [ROOT, ...segments, 'z'.repeat(7)].join('/');
		const overLimit = [ROOT, ...segments, 'z'.repeat(8)].join('/');
		expect(atLimit.length).toBe(6144);
		expect(DocumentName.parse(atLimit).toString()).toBe(atLimit);
		expect(catchPathError(() => DocumentName.parse(overLimit)).kind).toBe('lengthOutOfBounds');
	});

	it('builds from new()', () => {
		const root = RootDocumentName.parse(ROOT);
		const documentPath = new DocumentPath(
			CollectionPath.parse('chatrooms'),
			DocumentId.parse('chatroom1')
		);
		const documentName = new DocumentName(root, documentPath);
		expect(documentName.toString()).toBe(`${ROOT}/chatrooms/chatroom1`);
		expect(documentName.documentPath).toBe(documentPath);
		expect(documentName.rootDocumentName).toBe(root);
		expect(documentName.databaseName.toString()).toBe('projects/my-project/databases/my-database');
	});

	it('exposes the leaf ids', () => {
		const documentName = DocumentName.parse(`${ROOT}/chatrooms/chatroom1`);
		expect(documentName.collectionId.isEqual(CollectionId.parse('chatrooms'))).toBe(true);
		expect(documentName.documentId.isEqual(DocumentId.parse('chatroom1'))).toBe(true);
	});

	it('descends into collections', () => {
		const documentName = DocumentName.parse(`${ROOT}/chatrooms/chatroom1`);
		const expected = CollectionName.parse(`${ROOT}/chatrooms/chatroom1/messages`);
		expect(documentName.collection('messages').isEqual(expected)).toBe(true);
		expect(documentName.collection(CollectionId.parse('messages')).isEqual(expected)).toBe(true);

		const nested = CollectionName.parse(`${ROOT}/chatrooms/chatroom1/messages/message1/col`);
		expect(documentName.collection('messages/message1/col').isEqual(nested)).toBe(true);
		expect(
			documentName.collection(CollectionPath.parse('messages/message1/col')).isEqual(nested)
		).toBe(true);
	});

	it('descends into documents', () => {
		const documentName = DocumentName.parse(`${ROOT}/chatrooms/chatroom1`);
		expect(documentName.doc('messages/message1').toString()).toBe(
			`${ROOT}/chatrooms/chatroom1/messages/message1`
		);
		expect(documentName.doc(DocumentPath.parse('messages/message1/col/doc')).toString()).toBe(
			`${ROOT}/chatrooms/chatroom1/messages/message1/col/doc`
		);
		expect(catchPathError(() => documentName.doc('messages')).kind).toBe(
			'documentPathConversion'
		);
	});

	it('returns the parent collection name', () => {
		const top = DocumentName.parse(`${ROOT}/chatrooms/chatroom1`);
		expect(top.parent.toString()).toBe(`${ROOT}/chatrooms`);

		const nested = DocumentName.parse(`${ROOT}/chatrooms/chatroom1/messages/message1`);
		expect(
			nested.parent.isEqual(CollectionName.parse(`${ROOT}/chatrooms/chatroom1/messages`))
		).toBe(true);
	});

	it('returns the parent document name', () => {
		expect(DocumentName.parse(`${ROOT}/chatrooms/chatroom1`).parentDocumentName).toBeNull();

		const nested = DocumentName.parse(`${ROOT}/chatrooms/chatroom1/messages/message1`);
		expect(nested.parentDocumentName?.toString()).toBe(`${ROOT}/chatrooms/chatroom1`);
	});

	it('navigates consistently between levels', () => {
		const root = DatabaseName.parse('projects/my-project/databases/my-database').rootDocumentName;
		const documentName = root.doc('chatrooms/chatroom1/messages/message1');

		const parent = documentName.parent;
		expect(parent.collectionId.value).toBe('messages');

		const grandparent = parent.parent;
		expect(grandparent?.documentId.value).toBe('chatroom1');
		expect(documentName.parentDocumentName?.toString()).toBe(`${ROOT}/chatrooms/chatroom1`);
		expect(grandparent?.toString()).toBe(`${ROOT}/chatrooms/chatroom1`);
	});

	it('sorts by database name, then by document path', () => {
		const defaultRoot = 'projects/my-project/databases/(default)/documents';
		const names = [
			`${ROOT}/chatrooms/chatroom1/messages/message1`,
			`${ROOT}/users/u1`,
			`${defaultRoot}/users/u1`
		].map((value) => DocumentName.parse(value));
		const sorted = [...names].sort(DocumentName.compare).map((name) => name.toString());
		expect(sorted).toEqual([
			`${defaultRoot}/users/u1`,
			`${ROOT}/users/u1`,
			`${ROOT}/chatrooms/chatroom1/messages/message1`
		]);
	});
});
