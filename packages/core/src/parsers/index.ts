export { parseCommand, tokenize, extractBetween, extractToEnd } from './command-parser.js';
