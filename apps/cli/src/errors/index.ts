export { CommandError } from './command-error';
