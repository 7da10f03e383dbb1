export { scanTemplates, compareCodeUnits, type TemplateEntry } from './scanner.js';
