/**
 * Derived-field catalog.
 *
 * Derived fields are valid display titles that the accounting source does
 * not provide directly. Each maps to the raw fields its value is computed
 * from, in order.
 */

export type DerivedFieldCatalog = ReadonlyMap<string, readonly string[]>;

export const DERIVED_FIELDS: DerivedFieldCatalog = new Map([
  ["CPUEff", ["TotalCPU", "AllocCPUS", "Elapsed"]],
  ["MemEff", ["REQMEM", "NNodes", "AllocCPUS", "MaxRSS"]],
  ["TimeEff", ["Elapsed", "Timelimit"]],
]);

/**
 * Expand a field name into the raw fields it needs. Names outside the
 * catalog expand to themselves. Prerequisites that are themselves derived
 * are expanded recursively; a cycle throws, since catalogs are static.
 */
export function expandField(
  name: string,
  catalog: DerivedFieldCatalog = DERIVED_FIELDS,
): readonly string[] {
  return expandInto(name, catalog, []);
}

function expandInto(
  name: string,
  catalog: DerivedFieldCatalog,
  path: readonly string[],
): string[] {
  const prerequisites = catalog.get(name);
  if (prerequisites === undefined) {
    return [name];
  }
  if (path.includes(name)) {
    throw new Error(
      `Derived field cycle: ${[...path, name].join(" -> ")}`,
    );
  }
  const nextPath = [...path, name];
  return prerequisites.flatMap((p) => expandInto(p, catalog, nextPath));
}
