/**
 * Reachable URLs for the startup banner: first non-loopback IPv4 address
 * (IPv6 if there is none) plus the hostname.
 */

import { hostname, networkInterfaces, type NetworkInterfaceInfo } from "node:os";

type InterfaceTable = NodeJS.Dict<NetworkInterfaceInfo[]>;

export function findLanAddress(table: InterfaceTable = networkInterfaces()): string | null {
  const external = Object.values(table)
    .flatMap((infos) => infos ?? [])
    .filter((info) => !info.internal);
  const v4 = external.find((info) => info.family === "IPv4");
  if (v4) return v4.address;
  const v6 = external.find((info) => info.family === "IPv6");
  return v6 ? v6.address : null;
}

function hostPart(address: string): string {
  return address.includes(":") ? `[${address}]` : address;
}

export function reachableUrls(
  port: number,
  table: InterfaceTable = networkInterfaces(),
  host: string = hostname(),
): string[] {
  const urls: string[] = [];
  const lan = findLanAddress(table);
  if (lan) urls.push(`http://${hostPart(lan)}:${port}`);
  if (host) urls.push(`http://${host}:${port}`);
  if (urls.length === 0) urls.push(`http://localhost:${port}`);
  return urls;
}
