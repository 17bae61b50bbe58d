import { describe, it, expect } from "vitest";
import { fileURLToPath } from "url";
import {
  TenantDirectory,
  loadRegistry,
  loadTenantDirectory,
  parseTenantDocument,
  readTenantDocuments,
} from "../registry";
import { classifyRequestSchema } from "@shared/schema";
import { ConfigurationError } from "../utils/errorHandler";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("TenantDirectory", () => {
  const acme = loadRegistry({ programs: [{ name: "Housing" }] });
  const globex = loadRegistry({ programs: [{ name: "Transportation" }] });

  it("aliases default to the first loaded tenant", () => {
    const tenants = new TenantDirectory([["acme", acme], ["globex", globex]]);

    expect(tenants.organizations()).toEqual(["acme", "globex", "default"]);
    expect(tenants.resolve("default").registry).toBe(acme);
  });

  it("keeps an explicitly registered default tenant", () => {
    const own = loadRegistry({ programs: [{ name: "Mobility" }] });
    const tenants = new TenantDirectory([["acme", acme], ["default", own]]);

    expect(tenants.organizations()).toEqual(["acme", "default"]);
    expect(tenants.resolve("default").registry).toBe(own);
  });

  it("resolves a known organization without aliasing", () => {
    const tenants = new TenantDirectory([["acme", acme], ["globex", globex]]);

    expect(tenants.resolve("globex")).toEqual({ organization: "globex", registry: globex, aliased: false });
  });

  it("falls back to default for an unknown organization", () => {
    const tenants = new TenantDirectory([["acme", acme]]);
    const resolved = tenants.resolve("initech");

    expect(resolved.organization).toBe("default");
    expect(resolved.registry).toBe(acme);
    expect(resolved.aliased).toBe(true);
    expect(tenants.has("initech")).toBe(false);
  });

  it("registers the request default organization as its own key", () => {
    const tenants = new TenantDirectory([["acme", acme]]);
    const { organization } = classifyRequestSchema.parse({ text: "rent", organization: " " });

    expect(organization).toBe("default");
    expect(tenants.resolve(organization)).toEqual({ organization: "default", registry: acme, aliased: false });
  });

  it("serves an empty default registry when nothing is loaded", () => {
    const tenants = TenantDirectory.empty();

    expect(tenants.organizations()).toEqual(["default"]);
    expect(tenants.resolve("anything").registry.isEmpty).toBe(true);
  });
});

describe("parseTenantDocument", () => {
  it("parses YAML text", () => {
    expect(parseTenantDocument("programs:\n  - name: Housing\n", "acme.yaml")).toEqual({
      programs: [{ name: "Housing" }],
    });
  });

  it("returns null for an empty document", () => {
    expect(parseTenantDocument("", "empty.yaml")).toBeNull();
  });

  it("raises ConfigurationError naming the file for invalid YAML", () => {
    expect(() => parseTenantDocument("programs: [Housing", "acme.yaml")).toThrow(ConfigurationError);
    expect(() => parseTenantDocument("programs: [Housing", "acme.yaml")).toThrow(/^acme\.yaml: invalid YAML/);
  });
});

describe("loading the organizations directory", () => {
  it("reads .yaml and .yml files in name order and ignores other files", () => {
    const documents = readTenantDocuments(fixture("orgs"));

    expect(documents.map(doc => [doc.organization, doc.file])).toEqual([
      ["alpha", "alpha.yaml"],
      ["beta", "beta.yml"],
    ]);
  });

  it("builds one registry per organization with default aliased to the first", () => {
    const tenants = loadTenantDirectory(fixture("orgs"));

    expect(tenants.organizations()).toEqual(["alpha", "beta", "default"]);
    expect(tenants.resolve("alpha").registry.names()).toEqual(["Housing", "Mobility"]);
    expect(tenants.resolve("beta").registry.names()).toEqual(["Transportation"]);
    expect(tenants.resolve("default").registry).toBe(tenants.resolve("alpha").registry);
  });

  it("normalizes legacy tenant files", () => {
    const transportation = loadTenantDirectory(fixture("orgs")).resolve("beta").registry.get("Transportation");

    expect(transportation?.description).toBe("Rides to appointments.");
    expect(transportation?.keywords).toEqual(["ride", "bus"]);
  });

  it("fails start-up on a file that is not valid YAML", () => {
    expect(() => loadTenantDirectory(fixture("broken-orgs"))).toThrow(/^bad\.yaml: invalid YAML/);
  });

  it("starts with only an empty default tenant when the directory is missing", () => {
    const tenants = loadTenantDirectory(fixture("does-not-exist"));

    expect(tenants.organizations()).toEqual(["default"]);
    expect(tenants.resolve("default").registry.isEmpty).toBe(true);
  });
});
