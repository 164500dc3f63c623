export * from "./MetadataWriter";
export * from "./MetadataWriterDefault";
