export {
  type ServerVersion,
  ZERO_VERSION,
  serverVersion,
  parseServerVersion,
  compareVersions,
  formatVersion,
} from './server-version'
export { VERSION } from './package-version'
