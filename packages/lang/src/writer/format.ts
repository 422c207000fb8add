// Number formatting shared by the writers and the reflection inspector

function stripTrailingZeros(text: string): string {
  if (!text.includes(".")) return text;
  return text.replace(/0+$/, "").replace(/\.$/, "");
}

/**
 * printf-style `%g`: `precision` significant digits, trailing zeros removed,
 * exponent notation when the exponent is below -4 or at least `precision`.
 */
export function formatGeneral(value: number, precision = 6): string {
  if (Number.isNaN(value)) return "nan";
  if (!Number.isFinite(value)) return value < 0 ? "-inf" : "inf";
  if (value === 0) return Object.is(value, -0) ? "-0" : "0";

  const p = Math.max(1, precision);
  const [mantissa, exponentText] = value.toExponential(p - 1).split("e");
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= p) {
    const sign = exponent < 0 ? "-" : "+";
    const digits = String(Math.abs(exponent)).padStart(2, "0");
    return `${stripTrailingZeros(mantissa)}e${sign}${digits}`;
  }

  return stripTrailingZeros(value.toFixed(p - 1 - exponent));
}

// printf-style `%.Nf`
export function formatFixed(value: number, digits: number): string {
  if (Number.isNaN(value)) return "nan";
  if (!Number.isFinite(value)) return value < 0 ? "-inf" : "inf";
  return value.toFixed(digits);
}

/**
 * Float literal form: integral values below 1e9 keep one decimal so they
 * read back as floats, everything else uses `%g`.
 */
export function formatFloat(value: number): string {
  if (Number.isInteger(value) && Math.abs(value) < 1e9) {
    return formatFixed(value, 1);
  }
  return formatGeneral(value);
}
