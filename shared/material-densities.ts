/**
 * Local dust materials with tabulated refractive-index data.
 *
 * Densities are bulk values in g/cm³. Identifiers that are not in this table
 * are handed to Optool unchanged as built-in material names.
 */

export type MaterialSpec = {
  id: string;
  density?: number;
};

type MaterialEntry = {
  density: number;
  composition: string;
};

export const MATERIAL_TABLE: ReadonlyMap<string, Readonly<MaterialEntry>> = new Map<string, Readonly<MaterialEntry>>([
  ["x035", Object.freeze({ density: 2.7, composition: "(0.65)MgO-(0.35)SiO2" })],
  ["x040", Object.freeze({ density: 2.7, composition: "(0.60)MgO-(0.40)SiO2" })],
  ["x050A", Object.freeze({ density: 2.7, composition: "(0.50)MgO-(0.50)SiO2, structure A" })],
  ["x050B", Object.freeze({ density: 2.7, composition: "(0.50)MgO-(0.50)SiO2, structure B" })],
  ["E10", Object.freeze({ density: 2.8, composition: "Mg(0.9)Fe(0.1)SiO3, Fe3+" })],
  ["E10R", Object.freeze({ density: 2.8, composition: "Mg(0.9)Fe(0.1)SiO3, Fe2+" })],
  ["E20", Object.freeze({ density: 2.9, composition: "Mg(0.8)Fe(0.2)SiO3, Fe3+" })],
  ["E20R", Object.freeze({ density: 2.9, composition: "Mg(0.8)Fe(0.2)SiO3, Fe2+" })],
  ["E30", Object.freeze({ density: 3.0, composition: "Mg(0.7)Fe(0.3)SiO3, Fe3+" })],
  ["E30R", Object.freeze({ density: 3.0, composition: "Mg(0.7)Fe(0.3)SiO3, Fe2+" })],
  ["E40", Object.freeze({ density: 3.1, composition: "Mg(0.6)Fe(0.4)SiO3, Fe3+" })],
  ["E40R", Object.freeze({ density: 3.1, composition: "Mg(0.6)Fe(0.4)SiO3, Fe2+" })],
]);

export const LOCAL_MATERIAL_IDS: readonly string[] = Object.freeze([...MATERIAL_TABLE.keys()]);

export const isLocalMaterial = (id: string): boolean => MATERIAL_TABLE.has(id);

// Unknown ids are Optool built-ins: no density, never an error.
export function lookupMaterial(id: string): MaterialSpec {
  const entry = MATERIAL_TABLE.get(id);
  return entry ? { id, density: entry.density } : { id };
}

export function describeLocalMaterials(): string[] {
  return LOCAL_MATERIAL_IDS.map((id) => {
    const entry = MATERIAL_TABLE.get(id);
    return entry ? `${id} (density: ${entry.density} g/cm³; ${entry.composition})` : id;
  });
}
