/**
 * @helpmirror/help-index
 *
 * Parses catalog payloads into the catalog model and renders the index files
 * the help viewer reads. Pure functions, no I/O.
 */

export { parseLocales, parseCatalog } from "./parser.js";

export {
  renderSetupIndex,
  renderGroupIndex,
  renderBookIndex,
  escapeXml,
} from "./renderer.js";

export {
  SETUP_INDEX_FILE_NAME,
  PACKAGES_DIRECTORY,
  PACKAGE_FILE_EXTENSION,
  INDEX_FILE_EXTENSIONS,
  escapeFileComponent,
  packageFileName,
  bookFileName,
  groupFileName,
  isIndexFileName,
} from "./file-names.js";
