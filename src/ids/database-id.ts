import { assertByteLength, assertResourceIdCharacters, Identifier } from './identifier.js';

const DEFAULT_DATABASE_ID = '(default)';

/**
 * A Firestore database id. `(default)` names the project's default database.
 * <https://firebase.google.com/docs/firestore/reference/rest/v1/projects.databases/create#query-parameters>
 */
export class DatabaseId extends Identifier {
	readonly kind = 'databaseId';

	private constructor(value: string) {
		super(value);
		Object.freeze(this);
	}

	static default(): DatabaseId {
		return new DatabaseId(DEFAULT_DATABASE_ID);
	}

	static parse(value: string): DatabaseId {
		if (value === DEFAULT_DATABASE_ID) {
			return DatabaseId.default();
		}
		assertByteLength(value, 4, 63);
		assertResourceIdCharacters(value);
		return new DatabaseId(value);
	}

	static from(value: string | DatabaseId): DatabaseId {
		return value instanceof DatabaseId ? value : DatabaseId.parse(value);
	}

	get isDefault(): boolean {
		return this.value === DEFAULT_DATABASE_ID;
	}

	isEqual(other: DatabaseId): boolean {
		return other instanceof DatabaseId && this.value === other.value;
	}
}
