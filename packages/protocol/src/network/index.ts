export {
  parseNetwork,
  isValidNetwork,
  networkContains,
  networkEquals,
  networkToText,
  normalizeCidr,
  InvalidNetworkError,
  type AddressFamily,
  type Network,
} from './cidr.js';
