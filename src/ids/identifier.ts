import { PathError } from '../errors.js';

const encoder = new TextEncoder();

export function byteLength(value: string): number {
	return encoder.encode(value).length;
}

export function assertByteLength(value: string, min: number, max: number): void {
	const length = byteLength(value);
	if (length < min || length > max) {
		throw new PathError('lengthOutOfBounds');
	}
}

const LOWER_ALNUM_HYPHEN_RE = /^[a-z0-9-]*$/;
const LOWER_LETTER_RE = /^[a-z]/;

/**
 * Rules shared by project and database ids: lowercase letters, digits and
 * hyphens, starting with a letter and not ending with a hyphen.
 */
export function assertResourceIdCharacters(value: string): void {
	if (!LOWER_ALNUM_HYPHEN_RE.test(value)) {
		throw new PathError('containsInvalidCharacter');
	}
	if (!LOWER_LETTER_RE.test(value)) {
		throw new PathError('startsWithNonLetter');
	}
	if (value.endsWith('-')) {
		throw new PathError('endsWithHyphen');
	}
}

/**
 * Rules shared by collection and document ids.
 * <https://firebase.google.com/docs/firestore/quotas#collections_documents_and_fields>
 */
export function assertSegmentId(value: string): void {
	assertByteLength(value, 1, 1500);
	if (value.includes('/')) {
		throw new PathError('containsSlash');
	}
	if (value === '.' || value === '..') {
		throw new PathError('singlePeriodOrDoublePeriods');
	}
	if (value.startsWith('__') && value.endsWith('__')) {
		throw new PathError('matchesReservedIdPattern');
	}
}

/** Orders strings by Unicode code point, which matches their UTF-8 byte order. */
export function compareCodePoints(a: string, b: string): number {
	const left = Array.from(a, (char) => char.codePointAt(0) ?? 0);
	const right = Array.from(b, (char) => char.codePointAt(0) ?? 0);
	const length = Math.min(left.length, right.length);
	for (let index = 0; index < length; index++) {
		const diff = (left[index] ?? 0) - (right[index] ?? 0);
		if (diff !== 0) {
			return diff < 0 ? -1 : 1;
		}
	}
	return Math.sign(left.length - right.length);
}

export abstract class Identifier {
	readonly value: string;

	protected constructor(value: string) {
		this.value = value;
	}

	static compare<T extends Identifier>(a: T, b: T): number {
		return compareCodePoints(a.value, b.value);
	}

	toString(): string {
		return this.value;
	}

	toJSON(): string {
		return this.value;
	}
}
