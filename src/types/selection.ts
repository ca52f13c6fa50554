/**
 * JSON value accepted as a calculation argument.
 */
export type ArgValue =
    | string
    | number
    | boolean
    | null
    | readonly ArgValue[]
    | { readonly [key: string]: ArgValue };

export type ArgValues = Readonly<Record<string, ArgValue>>;

/**
 * `{ args, fields }` selection of a calculation.
 */
export interface CalculationSelection {
    readonly args?: ArgValues;
    readonly fields?: Selection;
}

/**
 * Value under a complex field key.
 * - a list for relationships, nested maps, unions and arg-less entity calculations
 * - `{ args, fields }` for calculations
 * - a bare `{ variantTag: [...] }` object for union fields (one-element shorthand)
 */
export type SelectionValue = Selection | CalculationSelection | ComplexSelection;

export interface ComplexSelection {
    readonly [field: string]: SelectionValue;
}

/**
 * A primitive field name, or an object keyed by complex field names.
 */
export type SelectionNode = string | ComplexSelection;

export type Selection = readonly SelectionNode[];

/** Path of field names from the root entity to a selection node */
export type SelectionPath = readonly string[];
