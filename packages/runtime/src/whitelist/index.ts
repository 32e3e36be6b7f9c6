export { WhitelistMatcher, createWhitelistMatcher } from './matcher.js';
export { WhitelistAdmin, createWhitelistAdmin, type WhitelistAdminOptions } from './admin.js';
