export * from "./span";
export { SourceFile, readSourceFile } from "./source";
