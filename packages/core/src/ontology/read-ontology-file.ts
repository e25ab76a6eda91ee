import { readFile } from 'node:fs/promises';
import { OntologyLoadError, parseOntologyDocument } from './loader';
import type { LoaderOptions, OntologyTables } from './types';

export async function readOntologyFile(path: string, options: LoaderOptions = {}): Promise<OntologyTables> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (err) {
    throw new OntologyLoadError(`Cannot read ontology file ${path}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new OntologyLoadError(`Ontology file ${path} is not valid JSON`, { cause: err });
  }

  return parseOntologyDocument(raw, options);
}
