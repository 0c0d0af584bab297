import { assertSegmentId, Identifier } from './identifier.js';

export class DocumentId extends Identifier {
	readonly kind = 'documentId';

	private constructor(value: string) {
		super(value);
		Object.freeze(this);
	}

	static parse(value: string): DocumentId {
		assertSegmentId(value);
		return new DocumentId(value);
	}

	static from(value: string | DocumentId): DocumentId {
		return value instanceof DocumentId ? value : DocumentId.parse(value);
	}

	isEqual(other: DocumentId): boolean {
		return other instanceof DocumentId && this.value === other.value;
	}
}
