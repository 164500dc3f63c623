export * from "./MetadataReconciler";
export * from "./MetadataReconcilerDefault";
export * from "./SkipRule";
