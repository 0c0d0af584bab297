import { wrapConversion } from '../errors.js';
import { CollectionId } from '../ids/collection-id.js';
import { DocumentId } from '../ids/document-id.js';
import { Identifier } from '../ids/identifier.js';
import { DocumentPath } from './document-path.js';

export type CollectionPathLike = string | CollectionId | CollectionPath;

/**
 * A collection path relative to the database root.
 *
 * format:
 * - `{collection_id}`
 * - `{document_path}/{collection_id}`
 */
export class CollectionPath {
	private readonly documentPath: DocumentPath | null;
	readonly collectionId: CollectionId;

	constructor(parent: DocumentPath | null, collectionId: CollectionId) {
		this.documentPath = parent;
		this.collectionId = collectionId;
		Object.freeze(this);
	}

	static parse(value: string): CollectionPath {
		const index = value.lastIndexOf('/');
		if (index === -1) {
			return new CollectionPath(null, CollectionId.parse(value));
		}
		const parent = DocumentPath.parse(value.slice(0, index));
		return new CollectionPath(parent, CollectionId.parse(value.slice(index + 1)));
	}

	static from(value: CollectionPathLike): CollectionPath {
		if (value instanceof CollectionPath) {
			return value;
		}
		if (value instanceof CollectionId) {
			return new CollectionPath(null, value);
		}
		return CollectionPath.parse(value);
	}

	/**
	 * Orders by parent first, with top-level collections before nested ones,
	 * then by collection id.
	 */
	static compare(a: CollectionPath, b: CollectionPath): number {
		if (a.documentPath && b.documentPath) {
			const byParent = DocumentPath.compare(a.documentPath, b.documentPath);
			if (byParent !== 0) {
				return byParent;
			}
		} else if (a.documentPath) {
			return 1;
		} else if (b.documentPath) {
			return -1;
		}
		return Identifier.compare(a.collectionId, b.collectionId);
	}

	/** The enclosing document, or `null` for a top-level collection. */
	get parent(): DocumentPath | null {
		return this.documentPath;
	}

	doc(documentId: string | DocumentId): DocumentPath {
		const id = wrapConversion('documentIdConversion', () => DocumentId.from(documentId));
		return new DocumentPath(this, id);
	}

	/** Identifier strings from the root to this collection. */
	segments(): string[] {
		const head = this.documentPath ? this.documentPath.segments() : [];
		return [...head, this.collectionId.value];
	}

	isEqual(other: CollectionPath): boolean {
		return other instanceof CollectionPath && this.toString() === other.toString();
	}

	toString(): string {
		if (!this.documentPath) {
			return this.collectionId.toString();
		}
		return `${this.documentPath.toString()}/${this.collectionId.toString()}`;
	}

	toJSON(): string {
		return this.toString();
	}
}
