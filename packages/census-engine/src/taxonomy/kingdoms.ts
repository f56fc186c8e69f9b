/**
 * iNaturalist taxon ids of the kingdoms, as they appear at index 1 of an
 * ancestor-id sequence (index 0 is "Life").
 */
export const KINGDOMS: ReadonlyMap<number, string> = new Map([
  [1, "Animalia"],
  [47126, "Plantae"],
  [47170, "Fungi"],
  [48222, "Chromista"],
  [47686, "Protozoa"],
  [67333, "Bacteria"],
  [151817, "Archaea"]
]);

export const KINGDOM_ANCESTOR_INDEX = 1;
export const PHYLUM_ANCESTOR_INDEX = 2;
export const PHYLUM_RANK_LEVEL = 60;
