// Subject matching exports

export { NodePrivilegeContext } from './context.js';
export { matchesNodeMatcher, matchesSubject } from './subject.js';
