/**
 * ConditionStore: read side of condition persistence.
 *
 * The dispatcher loads a fresh record per decision and never caches it.
 * A production store reads the conditions table and runs each row through
 * `parseConditionRecord`; `MemoryConditionStore` serves tests and demos.
 */

import type { ValidationError } from "../lib/validation/index.js";
import { type AccountId, idToNumber } from "../shared/identifiers.js";
import { OK_VOID, type Result } from "../shared/result.js";
import { parseConditionRecord } from "./schema.js";
import type { ConditionRecord } from "./types.js";

export interface ConditionStore {
	/** Resolves to null when the account has no conditions row. */
	load(accountId: AccountId): Promise<ConditionRecord | null>;
}

export class MemoryConditionStore implements ConditionStore {
	private readonly records = new Map<number, ConditionRecord>();

	async load(accountId: AccountId): Promise<ConditionRecord | null> {
		return this.records.get(idToNumber(accountId)) ?? null;
	}

	/** Stores a record, replacing any previous one for the account. */
	put(accountId: AccountId, record: ConditionRecord): this {
		this.records.set(idToNumber(accountId), Object.freeze({ ...record }));
		return this;
	}

	/** Parses and stores a snake_case row. Leaves the store untouched on failure. */
	putRow(accountId: AccountId, row: unknown): Result<void, ValidationError> {
		const parsed = parseConditionRecord(row);
		if (!parsed.ok) return parsed;
		this.records.set(idToNumber(accountId), parsed.value);
		return OK_VOID;
	}

	delete(accountId: AccountId): boolean {
		return this.records.delete(idToNumber(accountId));
	}

	get size(): number {
		return this.records.size;
	}
}
