import { Address } from '../types/index.js';

export const ZERO_ADDRESS = '0x0000000000000000000000000000000000000000';

/**
 * Ethereum utility service for address validation and normalization
 */
export class EthereumService {
  /**
   * Check if a string is a valid Ethereum address (40 hex characters)
   */
  static isEthereumAddress(str: string): boolean {
    // Remove any whitespace and convert to lowercase
    const cleaned = str.trim().toLowerCase();

    // Check if it's exactly 40 hex characters (optionally with 0x prefix)
    const hexPattern = /^(0x)?[0-9a-f]{40}$/;
    return hexPattern.test(cleaned);
  }

  /**
   * Normalize Ethereum address (ensure it starts with 0x)
   */
  static normalizeEthereumAddress(address: string): string {
    const cleaned = address.trim().toLowerCase();
    return cleaned.startsWith('0x') ? cleaned : `0x${cleaned}`;
  }

  /**
   * Check if an address is the zero address
   */
  static isZeroAddress(address: string): boolean {
    return this.normalizeEthereumAddress(address) === ZERO_ADDRESS;
  }

  /**
   * Parse untrusted input into a normalized Address, or null if it is not one
   */
  static toAddress(value: unknown): Address | null {
    if (typeof value !== 'string' || !this.isEthereumAddress(value)) {
      return null;
    }
    const normalized = this.normalizeEthereumAddress(value);
    return this.isNormalized(normalized) ? normalized : null;
  }

  /**
   * Like toAddress, but the zero address is not a valid recipient of value
   */
  static toRecipient(value: unknown): Address | null {
    const address = this.toAddress(value);
    if (address === null || this.isZeroAddress(address)) {
      return null;
    }
    return address;
  }

  /**
   * Shorten an address for log output (0x1234...abcd)
   */
  static shorten(address: string): string {
    return `${address.slice(0, 6)}...${address.slice(-4)}`;
  }

  private static isNormalized(value: string): value is Address {
    return /^0x[0-9a-f]{40}$/.test(value);
  }
}
