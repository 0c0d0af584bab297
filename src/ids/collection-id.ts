import { assertSegmentId, Identifier } from './identifier.js';

export class CollectionId extends Identifier {
	readonly kind = 'collectionId';

	private constructor(value: string) {
		super(value);
		Object.freeze(this);
	}

	static parse(value: string): CollectionId {
		assertSegmentId(value);
		return new CollectionId(value);
	}

	static from(value: string | CollectionId): CollectionId {
		return value instanceof CollectionId ? value : CollectionId.parse(value);
	}

	isEqual(other: CollectionId): boolean {
		return other instanceof CollectionId && this.value === other.value;
	}
}
