export const DECIMALS = 10; // quantities and prices are held in 10^-10 atoms
export const ATOMS_PER_UNIT = 10_000_000_000n;
export const GAIN_DECIMALS = DECIMALS * 2; // atoms * atoms
const GAIN_ATOMS_PER_CENT = 1_000_000_000_000_000_000n; // 10^18

const MAX_EXPONENT = 100;
const AMOUNT_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

/**
 * Convert a raw cell value to atoms. Strings may carry thousands separators,
 * a sign, a decimal point and an exponent. Digits past {@link DECIMALS} are
 * truncated.
 */
export const toAtoms = (raw: string | number): bigint => {
  if (typeof raw === "number" && !Number.isFinite(raw)) {
    throw new Error(`Invalid amount: ${raw}`);
  }

  // Remove thousands separators
  const cleanAmount = String(raw).trim().replace(/,/g, "");

  const match = AMOUNT_PATTERN.exec(cleanAmount);
  if (!match) {
    throw new Error(`Invalid amount format: ${raw}`);
  }
  const [, sign = "", integerPart = "", fractionPart = "", exponentPart = "0"] =
    match;
  if (integerPart === "" && fractionPart === "") {
    throw new Error(`Invalid amount format: ${raw}`);
  }

  const exponent = Number(exponentPart);
  if (Math.abs(exponent) > MAX_EXPONENT) {
    throw new Error(`Amount out of range: ${raw}`);
  }

  // Move the decimal point by the exponent
  const digits = integerPart + fractionPart;
  const pointAt = integerPart.length + exponent;
  let whole: string;
  let fraction: string;
  if (pointAt <= 0) {
    whole = "";
    fraction = "0".repeat(-pointAt) + digits;
  } else if (pointAt >= digits.length) {
    whole = digits + "0".repeat(pointAt - digits.length);
    fraction = "";
  } else {
    whole = digits.slice(0, pointAt);
    fraction = digits.slice(pointAt);
  }

  const atoms =
    BigInt(whole || "0") * ATOMS_PER_UNIT +
    BigInt(fraction.padEnd(DECIMALS, "0").slice(0, DECIMALS));
  return sign === "-" ? -atoms : atoms;
};

export const absAtoms = (atoms: bigint): bigint => (atoms < 0n ? -atoms : atoms);

export const minAtoms = (a: bigint, b: bigint): bigint => (a <= b ? a : b);

/** Realized gain of `quantity` units sold at `salePrice` that cost `costBasis`, in gain atoms */
export const gainAtoms = (
  quantity: bigint,
  salePrice: bigint,
  costBasis: bigint,
): bigint => quantity * (salePrice - costBasis);

/** Value of `quantity` units at `unitPrice`, in gain atoms */
export const valueAtoms = (quantity: bigint, unitPrice: bigint): bigint =>
  quantity * unitPrice;

// Round gain atoms to whole cents, ties to even. Supports negative numbers as well.
export const roundToCents = (gain: bigint): bigint => {
  const abs = absAtoms(gain);
  let cents = abs / GAIN_ATOMS_PER_CENT;
  const rest = (abs % GAIN_ATOMS_PER_CENT) * 2n;
  if (
    rest > GAIN_ATOMS_PER_CENT ||
    (rest === GAIN_ATOMS_PER_CENT && cents % 2n === 1n)
  ) {
    cents += 1n;
  }
  return (gain < 0n ? -cents : cents) * GAIN_ATOMS_PER_CENT;
};

/** Plain decimal string with trailing zeros trimmed, e.g. `30`, `2.5`, `-1.25` */
export const formatFixed = (value: bigint, decimals: number): string => {
  const sign = value < 0n ? "-" : "";
  const abs = absAtoms(value);
  if (decimals === 0) return `${sign}${abs}`;

  const digits = abs.toString().padStart(decimals + 1, "0");
  const integerPart = digits.slice(0, -decimals);
  const fraction = digits.slice(-decimals).replace(/0+$/, "");
  return fraction ? `${sign}${integerPart}.${fraction}` : `${sign}${integerPart}`;
};

export const formatAtoms = (atoms: bigint): string => formatFixed(atoms, DECIMALS);

export const formatGain = (gain: bigint): string =>
  formatFixed(gain, GAIN_DECIMALS);
