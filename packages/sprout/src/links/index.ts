export {
  loadLinkFile,
  parseLinkEntries,
  isMalformedLinkEntry,
  DEFAULT_LINKS_FILE,
  type LinkEntry,
  type MalformedLinkEntry,
} from './link-file.js';
export { applyLinks, destinationProblem, type ApplyLinksOptions } from './link-applier.js';
