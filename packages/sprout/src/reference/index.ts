export { parseReference, inferOwnerRepo, DEFAULT_GITHUB_HOSTS, type ParseContext } from './reference-parser.js';
export { parseRemoteUrl, type ParsedRemote } from './remote-url.js';
