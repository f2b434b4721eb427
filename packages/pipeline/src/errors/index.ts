export { PackagingError } from './packaging-error';
