import { PathError, wrapConversion } from '../errors.js';
import { DatabaseId } from '../ids/database-id.js';
import { ProjectId } from '../ids/project-id.js';
import { CollectionPath, type CollectionPathLike } from '../path/collection-path.js';
import { DocumentPath, type DocumentPathLike } from '../path/document-path.js';
import { CollectionName } from './collection-name.js';
import { DatabaseName } from './database-name.js';
import { DocumentName } from './document-name.js';
import { assertNameLength, ROOT_SEGMENT_COUNT } from './limits.js';

/**
 * The parent of every top-level collection in a database.
 *
 * format: `projects/{project_id}/databases/{database_id}/documents`
 */
export class RootDocumentName {
	readonly databaseName: DatabaseName;

	constructor(databaseName: DatabaseName) {
		this.databaseName = databaseName;
		Object.freeze(this);
	}

	static parse(value: string): RootDocumentName {
		assertNameLength(value);
		const parts = value.split('/');
		if (parts.length !== ROOT_SEGMENT_COUNT) {
			throw new PathError('invalidNumberOfPathComponents');
		}
		const [projects, projectId = '', databases, databaseId = '', documents] = parts;
		if (projects !== 'projects' || databases !== 'databases' || documents !== 'documents') {
			throw new PathError('invalidName');
		}
		return new RootDocumentName(
			new DatabaseName(ProjectId.parse(projectId), DatabaseId.parse(databaseId))
		);
	}

	static from(value: string | RootDocumentName): RootDocumentName {
		return value instanceof RootDocumentName ? value : RootDocumentName.parse(value);
	}

	static compare(a: RootDocumentName, b: RootDocumentName): number {
		return DatabaseName.compare(a.databaseName, b.databaseName);
	}

	get projectId(): ProjectId {
		return this.databaseName.projectId;
	}

	get databaseId(): DatabaseId {
		return this.databaseName.databaseId;
	}

	collection(path: CollectionPathLike): CollectionName {
		const collectionPath = wrapConversion('collectionPathConversion', () =>
			CollectionPath.from(path)
		);
		return new CollectionName(this, collectionPath);
	}

	doc(path: DocumentPathLike): DocumentName {
		const documentPath = wrapConversion('documentPathConversion', () => DocumentPath.from(path));
		return new DocumentName(this, documentPath);
	}

	isEqual(other: RootDocumentName): boolean {
		return other instanceof RootDocumentName && this.databaseName.isEqual(other.databaseName);
	}

	toString(): string {
		return `${this.databaseName.toString()}/documents`;
	}

	toJSON(): string {
		return this.toString();
	}
}
