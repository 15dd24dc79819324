export type Quantity = "length" | "angle";

export type LengthUnit = "mm" | "cm" | "m" | "in" | "ft";
export type AngleUnit = "deg" | "rad";
export type Unit = LengthUnit | AngleUnit;

export const UNITS: readonly Unit[] = ["mm", "cm", "m", "in", "ft", "deg", "rad"];

export const CANONICAL_UNITS = {
  length: "mm",
  angle: "rad",
} as const satisfies Record<Quantity, Unit>;

/** Multiply by the factor to reach the canonical unit of the quantity. */
const UNIT_FACTORS: Record<Unit, { quantity: Quantity; factor: number }> = {
  mm: { quantity: "length", factor: 1 },
  cm: { quantity: "length", factor: 10 },
  m: { quantity: "length", factor: 1000 },
  in: { quantity: "length", factor: 25.4 },
  ft: { quantity: "length", factor: 304.8 },
  deg: { quantity: "angle", factor: Math.PI / 180 },
  rad: { quantity: "angle", factor: 1 },
};

const UNIT_ALIASES: Record<string, Unit> = {
  mm: "mm",
  millimeter: "mm",
  millimeters: "mm",
  millimetre: "mm",
  millimetres: "mm",
  cm: "cm",
  centimeter: "cm",
  centimeters: "cm",
  centimetre: "cm",
  centimetres: "cm",
  m: "m",
  meter: "m",
  meters: "m",
  metre: "m",
  metres: "m",
  in: "in",
  inch: "in",
  inches: "in",
  '"': "in",
  ft: "ft",
  foot: "ft",
  feet: "ft",
  "'": "ft",
  deg: "deg",
  degree: "deg",
  degrees: "deg",
  "°": "deg",
  rad: "rad",
  radian: "rad",
  radians: "rad",
};

const CANONICAL_DECIMALS = 9;

export type UnitConversion =
  | { ok: true; value: number; unit: Unit }
  | { ok: false; reason: "unknown-unit" | "wrong-quantity" | "not-finite" };

export function parseUnit(text: string): Unit | null {
  const key = text.trim().toLowerCase();
  return Object.prototype.hasOwnProperty.call(UNIT_ALIASES, key) ? (UNIT_ALIASES[key] ?? null) : null;
}

export function quantityOf(unit: Unit): Quantity {
  return UNIT_FACTORS[unit].quantity;
}

export function isLengthUnit(unit: Unit): unit is LengthUnit {
  return quantityOf(unit) === "length";
}

/**
 * Canonical values are rounded to a fixed number of decimals so that
 * 2.54 cm and 1 in land on the same number.
 */
export function roundCanonical(value: number): number {
  const rounded = Number(value.toFixed(CANONICAL_DECIMALS));
  return Object.is(rounded, -0) ? 0 : rounded;
}

export function toCanonical(value: number, unitText: string, quantity: Quantity): UnitConversion {
  if (!Number.isFinite(value)) {
    return { ok: false, reason: "not-finite" };
  }
  const unit = parseUnit(unitText);
  if (!unit) {
    return { ok: false, reason: "unknown-unit" };
  }
  const entry = UNIT_FACTORS[unit];
  if (entry.quantity !== quantity) {
    return { ok: false, reason: "wrong-quantity" };
  }
  return {
    ok: true,
    value: roundCanonical(value * entry.factor),
    unit: CANONICAL_UNITS[quantity],
  };
}

export function fromCanonical(value: number, unit: Unit): number {
  return roundCanonical(value / UNIT_FACTORS[unit].factor);
}

export function listUnits(quantity: Quantity): Unit[] {
  return UNITS.filter((unit) => UNIT_FACTORS[unit].quantity === quantity);
}
