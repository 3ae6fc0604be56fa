export { deriveMetadata, buildSchemaInput } from "./metadata.js";
export { renderCreateTable, renderSchema } from "./render.js";
