import { Ipv4Range } from "../models/geo-data";

const OCTET_PATTERN = /^(0|[1-9]\d{0,2})$/;
const PREFIX_PATTERN = /^\d+$/;

/**
 * Utility functions for working with IPv4 addresses
 */
export class IpUtil {
  static readonly MAX_PREFIX_LENGTH = 32;

  /**
   * Convert an IPv4 address to its numeric representation
   * Example: "192.168.1.1" -> 3232235777
   */
  static ipToLong(ip: string): number {
    return (
      ip
        .split(".")
        .reduce((acc, octet) => (acc << 8) + parseInt(octet, 10), 0) >>> 0
    );
  }

  /**
   * Convert a numeric representation back to an IPv4 address string
   * Example: 3232235777 -> "192.168.1.1"
   */
  static longToIp(long: number): string {
    return [
      (long >>> 24) & 255,
      (long >>> 16) & 255,
      (long >>> 8) & 255,
      long & 255,
    ].join(".");
  }

  /**
   * Validate if the given string is a dotted-decimal IPv4 address.
   * Octets with leading zeros ("010") are rejected as ambiguous.
   */
  static isValidIpv4(ip: string): boolean {
    const octets = ip.split(".");
    if (octets.length !== 4) return false;

    return octets.every(
      (octet) => OCTET_PATTERN.test(octet) && Number(octet) <= 255
    );
  }

  /**
   * Netmask with all host bits set for the given prefix length
   * Example: 24 -> 4294967040 (255.255.255.0)
   */
  static prefixToMask(prefixLength: number): number {
    if (prefixLength === 0) return 0;
    return (0xffffffff << (32 - prefixLength)) >>> 0;
  }

  /**
   * Convert a dotted netmask to its prefix length, or null if the mask bits
   * are not contiguous
   * Example: "255.255.240.0" -> 20
   */
  static netmaskToPrefix(netmask: string): number | null {
    if (!this.isValidIpv4(netmask)) return null;

    const hostBits = ~this.ipToLong(netmask) >>> 0;
    // host part must be of the form 0...01...1
    if ((hostBits & (hostBits + 1)) !== 0) return null;

    let prefixLength = 32;
    for (let bits = hostBits; bits > 0; bits >>>= 1) {
      prefixLength--;
    }
    return prefixLength;
  }

  /**
   * Calculate the number of IP addresses in a subnet
   */
  static calculateIPv4SubnetSize(prefixLength: number): number {
    // For a /24 subnet, we get 2^(32-24) = 2^8 = 256 addresses
    return Math.pow(2, 32 - prefixLength);
  }

  /**
   * Convert a dotted hostmask (inverted netmask) to its prefix length
   * Example: "0.0.0.255" -> 24
   */
  static hostmaskToPrefix(hostmask: string): number | null {
    if (!this.isValidIpv4(hostmask)) return null;

    const inverted = this.longToIp(~this.ipToLong(hostmask) >>> 0);
    return this.netmaskToPrefix(inverted);
  }

  /**
   * Parse the part after "/" as a prefix length ("24", "024"), a dotted
   * netmask ("255.255.255.0") or a dotted hostmask ("0.0.0.255").
   * Masks are read as netmasks first.
   */
  static parsePrefix(prefix: string): number | null {
    if (PREFIX_PATTERN.test(prefix)) {
      const prefixLength = parseInt(prefix, 10);
      return prefixLength <= this.MAX_PREFIX_LENGTH ? prefixLength : null;
    }
    return this.netmaskToPrefix(prefix) ?? this.hostmaskToPrefix(prefix);
  }

  /**
   * Parse CIDR notation (e.g., "192.168.1.0/24") to get start and end IPs.
   *
   * Host bits are masked off, so "10.0.0.5/30" gives 10.0.0.4 - 10.0.0.7.
   * A bare address is treated as a /32 network.
   */
  static parseIpv4Cidr(cidr: string): Ipv4Range | null {
    const parts = cidr.split("/");
    if (parts.length > 2) return null;

    const ip = parts[0];
    const prefixLength =
      parts.length === 1 ? this.MAX_PREFIX_LENGTH : this.parsePrefix(parts[1]);

    if (!this.isValidIpv4(ip) || prefixLength === null) {
      return null;
    }

    const startLong =
      (this.ipToLong(ip) & this.prefixToMask(prefixLength)) >>> 0;
    const endLong =
      startLong + this.calculateIPv4SubnetSize(prefixLength) - 1;

    return {
      start: this.longToIp(startLong),
      end: this.longToIp(endLong),
      startLong,
      endLong,
    };
  }
}
