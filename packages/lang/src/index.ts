// @keystone/lang - prefab/scene language front end and writer

export { Lexer } from "./lexer/lexer";
export { Parser, parsePrefab, parseScene, type ParseOptions } from "./parser/parser";
export {
  writePrefab,
  writeScene,
  writePropValue,
  writePrefabFile,
  writeSceneFile,
  escapeString,
  isValidIdentifier,
} from "./writer/writer";
export { formatGeneral, formatFixed, formatFloat } from "./writer/format";
