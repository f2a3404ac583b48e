import CryptoJS from 'crypto-js';

/**
 * Short deterministic hex digest used for article ids, feed ids and cache slots
 */
export function shortHash(text: string, length: number): string {
  return CryptoJS.MD5(text).toString().slice(0, length);
}
