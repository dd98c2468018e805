export interface Particle {
  name: string;
  mass: number; // relative to 1/12 of 12C
  charge: number; // coulomb
}

export const ELEMENTARY_CHARGE = 1.602176634e-19;

export const ELECTRON: Particle = { name: 'Electron', mass: 5.48579909065e-4, charge: -ELEMENTARY_CHARGE };
export const PROTON: Particle = { name: 'Proton', mass: 1.007276466621, charge: ELEMENTARY_CHARGE };
export const NEUTRON: Particle = { name: 'Neutron', mass: 1.00866491595, charge: 0 };
export const POSITRON: Particle = { name: 'Positron', mass: 5.48579909065e-4, charge: ELEMENTARY_CHARGE };

// Amino acid residues (free amino acid minus H2O)
export const AMINOACIDS: Readonly<Record<string, string>> = {
  G: 'C2H3NO', // Glycine
  P: 'C5H7NO', // Proline
  A: 'C3H5NO', // Alanine
  V: 'C5H9NO', // Valine
  L: 'C6H11NO', // Leucine
  I: 'C6H11NO', // Isoleucine
  M: 'C5H9NOS', // Methionine
  C: 'C3H5NOS', // Cysteine
  F: 'C9H9NO', // Phenylalanine
  Y: 'C9H9NO2', // Tyrosine
  W: 'C11H10N2O', // Tryptophan
  H: 'C6H7N3O', // Histidine
  K: 'C6H12N2O', // Lysine
  R: 'C6H12N4O', // Arginine
  Q: 'C5H8N2O2', // Glutamine
  N: 'C4H6N2O2', // Asparagine
  E: 'C5H7NO3', // Glutamic acid
  D: 'C4H5NO3', // Aspartic acid
  S: 'C3H5NO2', // Serine
  T: 'C4H7NO2', // Threonine
};

// Deoxynucleotide monophosphates minus H2O
export const DEOXYNUCLEOTIDES: Readonly<Record<string, string>> = {
  A: 'C10H12N5O5P',
  T: 'C10H13N2O7P',
  C: 'C9H12N3O6P',
  G: 'C10H12N5O6P',
};

// Nucleotide monophosphates minus H2O
export const NUCLEOTIDES: Readonly<Record<string, string>> = {
  A: 'C10H12N5O6P',
  U: 'C9H11N2O8P',
  C: 'C9H12N3O7P',
  G: 'C10H12N5O7P',
};

export const DNA_COMPLEMENTS: Readonly<Record<string, string>> = { A: 'T', T: 'A', C: 'G', G: 'C' };
export const RNA_COMPLEMENTS: Readonly<Record<string, string>> = { A: 'U', U: 'A', C: 'G', G: 'C' };

// A sequence of one-letter residues needs one of these to be read as peptide
export const PEPTIDE_MARKERS = 'AEGMLQRT';

export const OPENING_BRACKETS = '([{<';
export const CLOSING_BRACKETS = ')]}>';
