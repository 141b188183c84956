const IPV4_OCTET = /^(0|[1-9]\d{0,2})$/;
const CANONICAL_MAC = /^([0-9a-f]{2}:){5}[0-9a-f]{2}$/;

export function isIPv4Address(value: string): boolean {
  const octets = value.split(".");
  if (octets.length !== 4) {
    return false;
  }
  return octets.every((octet) => IPV4_OCTET.test(octet) && Number(octet) <= 255);
}

/**
 * Lowercases a link-layer address and returns it only when it is in the
 * six-octet colon-separated form. Anything else counts as no address.
 */
export function normalizeMac(value: string | null | undefined): string | null {
  const lowered = value?.trim().toLowerCase();
  if (!lowered || !CANONICAL_MAC.test(lowered)) {
    return null;
  }
  return lowered;
}

export function macToId(mac: string): string {
  return mac.replace(/:/g, "_");
}
