// Node-only entry point; kept apart so the browser bundle never pulls in fs.
export { readOntologyFile } from './ontology/read-ontology-file';
