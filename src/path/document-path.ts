import { PathError, wrapConversion } from '../errors.js';
import { CollectionId } from '../ids/collection-id.js';
import { DocumentId } from '../ids/document-id.js';
import { Identifier } from '../ids/identifier.js';
import { CollectionPath, type CollectionPathLike } from './collection-path.js';

export type DocumentPathLike = string | DocumentPath;

type ChainLink = {
	collectionId: CollectionId;
	documentId: DocumentId | null;
};

/**
 * Moves every segment of `path` under `base`, keeping the identifiers and
 * replacing only the root.
 */
function reroot(base: DocumentPath, path: CollectionPath): CollectionPath {
	// leaf to root; each link holds a collection id and the document id below it
	const links: ChainLink[] = [];
	let documentId: DocumentId | null = null;
	let cursor: CollectionPath | null = path;
	while (cursor) {
		links.push({ collectionId: cursor.collectionId, documentId });
		const parent: DocumentPath | null = cursor.parent;
		if (!parent) {
			break;
		}
		documentId = parent.documentId;
		cursor = parent.parent;
	}

	let current = base;
	let collectionPath: CollectionPath | null = null;
	for (const link of links.reverse()) {
		collectionPath = new CollectionPath(current, link.collectionId);
		if (link.documentId) {
			current = new DocumentPath(collectionPath, link.documentId);
		}
	}
	if (!collectionPath) {
		throw new Error('Invariant violation: empty collection path');
	}
	return collectionPath;
}

/**
 * A document path relative to the database root.
 *
 * format: `{collection_path}/{document_id}`
 */
export class DocumentPath {
	private readonly collectionPath: CollectionPath;
	readonly documentId: DocumentId;

	constructor(parent: CollectionPath, documentId: DocumentId) {
		this.collectionPath = parent;
		this.documentId = documentId;
		Object.freeze(this);
	}

	static parse(value: string): DocumentPath {
		const index = value.lastIndexOf('/');
		if (index === -1) {
			throw new PathError('notContainsSlash');
		}
		const parent = CollectionPath.parse(value.slice(0, index));
		return new DocumentPath(parent, DocumentId.parse(value.slice(index + 1)));
	}

	static from(value: DocumentPathLike): DocumentPath {
		return value instanceof DocumentPath ? value : DocumentPath.parse(value);
	}

	static compare(a: DocumentPath, b: DocumentPath): number {
		return (
			CollectionPath.compare(a.collectionPath, b.collectionPath) ||
			Identifier.compare(a.documentId, b.documentId)
		);
	}

	get parent(): CollectionPath {
		return this.collectionPath;
	}

	get collectionId(): CollectionId {
		return this.collectionPath.collectionId;
	}

	/**
	 * Appends a collection below this document. A multi-segment path such as
	 * `messages/message1/col` keeps all of its segments.
	 */
	collection(path: CollectionPathLike): CollectionPath {
		const collectionPath = wrapConversion('collectionPathConversion', () =>
			CollectionPath.from(path)
		);
		return reroot(this, collectionPath);
	}

	/** Appends a relative document path such as `messages/message1` below this document. */
	doc(path: DocumentPathLike): DocumentPath {
		const documentPath = wrapConversion('documentPathConversion', () => DocumentPath.from(path));
		return new DocumentPath(reroot(this, documentPath.parent), documentPath.documentId);
	}

	segments(): string[] {
		return [...this.collectionPath.segments(), this.documentId.value];
	}

	isEqual(other: DocumentPath): boolean {
		return other instanceof DocumentPath && this.toString() === other.toString();
	}

	toString(): string {
		return `${this.collectionPath.toString()}/${this.documentId.toString()}`;
	}

	toJSON(): string {
		return this.toString();
	}
}
