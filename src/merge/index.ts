export {
  mergeTemplates,
  resolveSelection,
  renderMergedDocument,
  sourceMarker,
  type MergedDocument,
  type MergedSection,
} from './merger.js';

export { writeMergedDocument, STDOUT_TARGET } from './writer.js';
