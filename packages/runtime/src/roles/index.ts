export { parseRoleDefinitions } from './definitions.js';
