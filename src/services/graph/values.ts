import neo4j from 'neo4j-driver';

export const toJsNumber = (val: unknown): number => {
  if (neo4j.isInt(val)) return val.toNumber();
  return typeof val === 'number' ? val : 0;
};

export const toStringValue = (val: unknown): string => (typeof val === 'string' ? val : '');

export const toNullableString = (val: unknown): string | null => (typeof val === 'string' ? val : null);

export const toNumberList = (val: unknown): number[] => (Array.isArray(val) ? val.map(toJsNumber) : []);

/** Properties of a returned node, or an empty object for anything else. */
export function nodeProperties(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || !('properties' in value)) return {};
  const { properties } = value;
  if (typeof properties !== 'object' || properties === null) return {};
  return Object.fromEntries(Object.entries(properties));
}
