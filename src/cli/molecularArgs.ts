/**
 * @fileoverview Turns `--formula`, `--exact-mass` and `--molecular-weight`
 * into the attributes of a molecular search.
 * @module src/cli/molecularArgs
 */

import { MolecularAttributes, MolecularQuery } from "../services/KEGG/core/keggUrl.js";
import { finiteNumber, validationError } from "./io.js";

function rangeValues(
  values: string[] | undefined,
  optionName: string,
): MolecularQuery | undefined {
  if (values === undefined || values.length === 0) return undefined;
  const numbers = values.map((value) => {
    const parsed = finiteNumber.safeParse(value);
    if (!parsed.success) {
      throw validationError(`Invalid value for --${optionName}: "${value}"`);
    }
    return parsed.data;
  });
  if (numbers.length > 2) {
    throw validationError(
      `Range can only be specified by two values but ${numbers.length} values were provided: ${numbers.join(", ")}`,
    );
  }
  return numbers.length === 1 ? numbers[0] : numbers;
}

export function molecularAttributeArgs(
  formula: string | undefined,
  exactMass: string[] | undefined,
  molecularWeight: string[] | undefined,
): MolecularAttributes {
  return {
    formula,
    exactMass: rangeValues(exactMass, "exact-mass"),
    molecularWeight: rangeValues(molecularWeight, "molecular-weight"),
  };
}
