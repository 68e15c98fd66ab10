export type NumericKind = 'integer' | 'real';

// Integers are unbounded; reals are IEEE doubles
export type IntegerValue = { kind: 'integer'; value: bigint };
export type RealValue = { kind: 'real'; value: number };

export type NumValue = IntegerValue | RealValue;

export type GlobalStore = Map<string, NumValue>;

export function isInteger(v: NumValue): v is IntegerValue { return v.kind === 'integer'; }
export function isReal(v: NumValue): v is RealValue { return v.kind === 'real'; }

export function createInteger(value: bigint): IntegerValue {
    return { kind: 'integer', value };
}

export function createReal(value: number): RealValue {
    return { kind: 'real', value };
}

export function toReal(v: NumValue): number {
    return isInteger(v) ? Number(v.value) : v.value;
}

/**
 * Applies an arithmetic operator with ordinary promotion: exact integer arithmetic when both
 * operands are integers, real arithmetic otherwise.
 */
export function combine(
    a: NumValue,
    b: NumValue,
    onIntegers: (x: bigint, y: bigint) => bigint,
    onReals: (x: number, y: number) => number
): NumValue {
    if (isInteger(a) && isInteger(b)) {
        return createInteger(onIntegers(a.value, b.value));
    }
    return createReal(onReals(toReal(a), toReal(b)));
}

/** Integer division rounded toward negative infinity. */
export function floorDiv(a: bigint, b: bigint): bigint {
    const quotient = a / b;
    return a % b !== 0n && (a < 0n) !== (b < 0n) ? quotient - 1n : quotient;
}

/**
 * Positional decimal text for a real, never in exponent notation, so that the lexer reads
 * it back as the same value. Whole reals keep a ".0".
 */
export function formatReal(value: number): string {
    if (!Number.isFinite(value)) return String(value);

    const text = String(value);
    const exponentAt = text.indexOf('e');
    if (exponentAt === -1) {
        return Number.isInteger(value) ? `${text}.0` : text;
    }

    const sign = text.startsWith('-') ? '-' : '';
    const mantissa = text.slice(sign.length, exponentAt);
    const exponent = Number(text.slice(exponentAt + 1));
    const dot = mantissa.indexOf('.');
    const digits = mantissa.replace('.', '');
    const point = (dot === -1 ? mantissa.length : dot) + exponent;

    if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
    if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}.0`;
    return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

export function formatValue(v: NumValue): string {
    return isInteger(v) ? v.value.toString() : formatReal(v.value);
}

/** Integers outside the safe JSON range come out as decimal strings. */
export function jsonInteger(value: bigint): number | string {
    const n = Number(value);
    return Number.isSafeInteger(n) ? n : value.toString();
}

export function toJSONNumber(v: NumValue): number | string {
    return isInteger(v) ? jsonInteger(v.value) : v.value;
}

export function toJS(store: GlobalStore): Record<string, number | bigint> {
    const obj: Record<string, number | bigint> = {};
    for (const [name, v] of store) {
        obj[name] = v.value;
    }
    return obj;
}
