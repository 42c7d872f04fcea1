export { formatFixed, roundTo } from './format.js';
