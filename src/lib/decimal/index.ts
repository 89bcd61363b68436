/**
 * LibDecimal: domain-agnostic wrapper around decimal.js-light.
 *
 * Used where a stored quantity is rescaled before it reaches an executor
 * (e.g. market-cap limits kept in units of 10,000), so that `1.1 × 10,000`
 * is 11000 rather than 11000.000000000002.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 40 });

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	/**
	 * Creates a LibDecimal from a string or number.
	 * @throws Error if value is not finite (for numbers) or empty (for strings)
	 * @example LibDecimal.from("123.45")
	 */
	static from(value: string | number): LibDecimal {
		if (typeof value === "number") {
			if (!Number.isFinite(value)) {
				throw new Error(`LibDecimal.from: invalid number ${value}`);
			}
			return new LibDecimal(new DecimalLight(value));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	mul(other: LibDecimal): LibDecimal {
		return new LibDecimal(this.raw.times(other.raw));
	}

	toString(): string {
		return this.raw.toString();
	}

	/** Lossy: only call at the boundary where a plain number is required. */
	toNumber(): number {
		return this.raw.toNumber();
	}
}

/** Multiplies a plain number by an exact factor, returning a plain number. */
export function scaleExact(value: number, factor: number): number {
	return LibDecimal.from(value).mul(LibDecimal.from(factor)).toNumber();
}
