import { PathError } from '../errors.js';
import type { CollectionId } from '../ids/collection-id.js';
import type { DocumentId } from '../ids/document-id.js';
import { CollectionPath } from '../path/collection-path.js';
import type { DatabaseName } from './database-name.js';
import { DocumentName } from './document-name.js';
import { assertNameLength, ROOT_SEGMENT_COUNT } from './limits.js';
import { RootDocumentName } from './root-document-name.js';

/**
 * format: `{root_document_name}/{collection_path}`
 */
export class CollectionName {
	readonly rootDocumentName: RootDocumentName;
	readonly collectionPath: CollectionPath;

	constructor(rootDocumentName: RootDocumentName, collectionPath: CollectionPath) {
		this.rootDocumentName = rootDocumentName;
		this.collectionPath = collectionPath;
		Object.freeze(this);
	}

	static parse(value: string): CollectionName {
		assertNameLength(value);
		const parts = value.split('/');
		const relative = parts.length - ROOT_SEGMENT_COUNT;
		if (relative < 1 || relative % 2 === 0) {
			throw new PathError('invalidNumberOfPathComponents');
		}
		return new CollectionName(
			RootDocumentName.parse(parts.slice(0, ROOT_SEGMENT_COUNT).join('/')),
			CollectionPath.parse(parts.slice(ROOT_SEGMENT_COUNT).join('/'))
		);
	}

	static from(value: string | CollectionName): CollectionName {
		return value instanceof CollectionName ? value : CollectionName.parse(value);
	}

	/** Orders by collection path, then by root document name. */
	static compare(a: CollectionName, b: CollectionName): number {
		return (
			CollectionPath.compare(a.collectionPath, b.collectionPath) ||
			RootDocumentName.compare(a.rootDocumentName, b.rootDocumentName)
		);
	}

	get collectionId(): CollectionId {
		return this.collectionPath.collectionId;
	}

	get databaseName(): DatabaseName {
		return this.rootDocumentName.databaseName;
	}

	/** The enclosing document, or `null` for a top-level collection. */
	get parent(): DocumentName | null {
		const documentPath = this.collectionPath.parent;
		if (!documentPath) {
			return null;
		}
		return new DocumentName(this.rootDocumentName, documentPath);
	}

	doc(documentId: string | DocumentId): DocumentName {
		return new DocumentName(this.rootDocumentName, this.collectionPath.doc(documentId));
	}

	isEqual(other: CollectionName): boolean {
		return other instanceof CollectionName && this.toString() === other.toString();
	}

	toString(): string {
		return `${this.rootDocumentName.toString()}/${this.collectionPath.toString()}`;
	}

	toJSON(): string {
		return this.toString();
	}
}
