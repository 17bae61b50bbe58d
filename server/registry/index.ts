export { Registry, type Program, type Service, type Contact } from "./types";
export { loadRegistry, normalizeKeywords, deriveKeyTerms } from "./loader";
export { TenantDirectory, type ResolvedTenant } from "./tenants";
export {
  loadTenantDirectory,
  readTenantDocuments,
  buildTenantDirectory,
  parseTenantDocument,
  type TenantDocument,
} from "./configSource";
