import { PathError } from '../errors.js';
import type { CollectionId } from '../ids/collection-id.js';
import type { DocumentId } from '../ids/document-id.js';
import type { CollectionPathLike } from '../path/collection-path.js';
import { DocumentPath, type DocumentPathLike } from '../path/document-path.js';
import { CollectionName } from './collection-name.js';
import { DatabaseName } from './database-name.js';
import { assertNameLength, ROOT_SEGMENT_COUNT } from './limits.js';
import { RootDocumentName } from './root-document-name.js';

/**
 * format: `{root_document_name}/{document_path}`
 */
export class DocumentName {
	readonly rootDocumentName: RootDocumentName;
	readonly documentPath: DocumentPath;

	constructor(rootDocumentName: RootDocumentName, documentPath: DocumentPath) {
		this.rootDocumentName = rootDocumentName;
		this.documentPath = documentPath;
		Object.freeze(this);
	}

	static parse(value: string): DocumentName {
		assertNameLength(value);
		const parts = value.split('/');
		const relative = parts.length - ROOT_SEGMENT_COUNT;
		if (relative < 2 || relative % 2 !== 0) {
			throw new PathError('invalidNumberOfPathComponents');
		}
		return new DocumentName(
			RootDocumentName.parse(parts.slice(0, ROOT_SEGMENT_COUNT).join('/')),
			DocumentPath.parse(parts.slice(ROOT_SEGMENT_COUNT).join('/'))
		);
	}

	static from(value: string | DocumentName): DocumentName {
		return value instanceof DocumentName ? value : DocumentName.parse(value);
	}

	/** Orders by database name, then by document path. */
	static compare(a: DocumentName, b: DocumentName): number {
		return (
			DatabaseName.compare(a.databaseName, b.databaseName) ||
			DocumentPath.compare(a.documentPath, b.documentPath)
		);
	}

	get collectionId(): CollectionId {
		return this.documentPath.collectionId;
	}

	get documentId(): DocumentId {
		return this.documentPath.documentId;
	}

	get databaseName(): DatabaseName {
		return this.rootDocumentName.databaseName;
	}

	get parent(): CollectionName {
		return new CollectionName(this.rootDocumentName, this.documentPath.parent);
	}

	/**
	 * The document that owns this document's collection, or `null` when the
	 * collection is top-level.
	 */
	get parentDocumentName(): DocumentName | null {
		const documentPath = this.documentPath.parent.parent;
		if (!documentPath) {
			return null;
		}
		return new DocumentName(this.rootDocumentName, documentPath);
	}

	collection(path: CollectionPathLike): CollectionName {
		return new CollectionName(this.rootDocumentName, this.documentPath.collection(path));
	}

	doc(path: DocumentPathLike): DocumentName {
		return new DocumentName(this.rootDocumentName, this.documentPath.doc(path));
	}

	isEqual(other: DocumentName): boolean {
		return other instanceof DocumentName && this.toString() === other.toString();
	}

	toString(): string {
		return `${this.rootDocumentName.toString()}/${this.documentPath.toString()}`;
	}

	toJSON(): string {
		return this.toString();
	}
}
