export { ClassDiagramParser } from "./class-diagram-parser";
export { DeclarationExtractor } from "./declaration-extractor";
export { MemberParser, DEFAULT_ATTRIBUTE_TYPE, DEFAULT_RETURN_TYPE, type ParsedMembers } from "./member-parser";
export { RelationshipResolver } from "./relationship-resolver";
export { stripComments, lineAt } from "./comments";
export type * from "./types";
