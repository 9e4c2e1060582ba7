import { PackagingType } from './enums.js';

export type PackagingDimensions = {
  type: PackagingType | null | undefined;
  lengthMm: number | null | undefined;
  widthMm: number | null | undefined;
  heightMm: number | null | undefined;
};

/**
 * Packaging number as printed on boxes and pallets: `A 1340-560-440` for non-returnable
 * packaging, `B 1340-560-440` for returnable. Null until the type and all dimensions are known.
 */
export function formatPackagingNumber(dims: PackagingDimensions): string | null {
  const { type, lengthMm, widthMm, heightMm } = dims;
  if (type == null || lengthMm == null || widthMm == null || heightMm == null) return null;
  const prefix = type === PackagingType.NonReturnable ? 'A' : 'B';
  return `${prefix} ${lengthMm}-${widthMm}-${heightMm}`;
}
