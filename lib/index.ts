export * from "./toolbox/common";
export * from "./toolbox/config";
export * from "./toolbox/debug";
export * from "./misc/subject";
export * from "./inventory/artifact";
export * from "./inventory/decoder";
export * from "./inventory/classifier";
export * from "./inventory/collector";
export * from "./inventory/key_extractor";
export * from "./inventory/key_registry";
export * from "./inventory/signature_resolver";
export * from "./inventory/reporter";
export * from "./inventory/inventory";
export { main, runInventory } from "./cli/pem_inventory";
