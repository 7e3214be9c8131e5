/**
 * LibDecimal — thin wrapper around decimal.js-light.
 *
 * Used where human-entered decimal strings ("3000.25", "0.01") meet
 * integer base units. Ledger code works in bigint and only touches this
 * module through shared/units.
 */
import DecimalLight from "decimal.js-light";

DecimalLight.set({ precision: 80, rounding: DecimalLight.ROUND_DOWN });

const DECIMAL_RE = /^-?(\d+\.?\d*|\.\d+)$/;

export class LibDecimal {
	private readonly raw: DecimalLight;

	private constructor(raw: DecimalLight) {
		this.raw = raw;
	}

	/**
	 * @throws Error for empty strings and anything but plain decimal notation
	 * @example LibDecimal.from("0.01")
	 * @example LibDecimal.from(10n ** 18n)
	 */
	static from(value: string | bigint): LibDecimal {
		if (typeof value === "bigint") {
			return new LibDecimal(new DecimalLight(value.toString()));
		}
		const trimmed = value.trim();
		if (trimmed.length === 0) {
			throw new Error("LibDecimal.from: empty string");
		}
		if (!DECIMAL_RE.test(trimmed)) {
			throw new Error(`LibDecimal.from: not a plain decimal "${trimmed}"`);
		}
		return new LibDecimal(new DecimalLight(trimmed));
	}

	/**
	 * Multiplies by 10^places; negative places divide.
	 * @example LibDecimal.from("1.5").shift(8).toString() // "150000000"
	 */
	shift(places: number): LibDecimal {
		const factor = new DecimalLight(`1e${Math.abs(places)}`);
		return new LibDecimal(places >= 0 ? this.raw.times(factor) : this.raw.dividedBy(factor));
	}

	isNegative(): boolean {
		return this.raw.isNegative();
	}

	/** Number of significant fractional digits. */
	decimalPlaces(): number {
		return this.raw.decimalPlaces();
	}

	/**
	 * Integer value as bigint, truncating any fractional part toward zero.
	 * @example LibDecimal.from("12.9").toBigInt() // 12n
	 */
	toBigInt(): bigint {
		return BigInt(this.raw.toDecimalPlaces(0, DecimalLight.ROUND_DOWN).toFixed(0));
	}

	/** Plain notation without trailing zeros. */
	toString(): string {
		const fixed = this.raw.toFixed();
		if (fixed.indexOf(".") === -1) {
			return fixed;
		}
		return fixed.replace(/0+$/, "").replace(/\.$/, "");
	}
}
