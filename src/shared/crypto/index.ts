export { CryptoEngine, KEY_LENGTH, NONCE_LENGTH, AUTH_TAG_LENGTH } from './engine.js';
export { generateSharedKey, saveSharedKey, loadSharedKey, fingerprint } from './keys.js';
