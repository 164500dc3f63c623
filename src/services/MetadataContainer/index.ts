export * from "./MetadataContainer";
export * from "./MetadataContainerPiexif";
export * from "./MetadataDateTimeHelper";
