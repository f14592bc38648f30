export { generateId } from './id-generator.js';
export { getSystemModuleType, MODULE_TYPE_SEPARATOR } from './module-type.js';
