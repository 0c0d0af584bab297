import { PathError } from '../errors.js';
import { assertByteLength, assertResourceIdCharacters, Identifier } from './identifier.js';

const RESERVED_WORDS = ['google', 'null', 'undefined', 'ssl'] as const;

/**
 * A Google Cloud project id.
 * <https://cloud.google.com/resource-manager/docs/creating-managing-projects>
 */
export class ProjectId extends Identifier {
	readonly kind = 'projectId';

	private constructor(value: string) {
		super(value);
		Object.freeze(this);
	}

	static parse(value: string): ProjectId {
		assertByteLength(value, 6, 30);
		assertResourceIdCharacters(value);
		if (RESERVED_WORDS.some((word) => value.includes(word))) {
			throw new PathError('containsReservedWord');
		}
		return new ProjectId(value);
	}

	static from(value: string | ProjectId): ProjectId {
		return value instanceof ProjectId ? value : ProjectId.parse(value);
	}

	isEqual(other: ProjectId): boolean {
		return other instanceof ProjectId && this.value === other.value;
	}
}
