import type { FirmwareFamily } from '../types/firmware';

export const MANAGED_FAMILIES: readonly FirmwareFamily[] = [
  { id: 'gpu-vendor', pattern: 'gpu-firmware-(amd|intel|radeon)-kmod', description: 'AMD, Intel and Radeon GPU firmware' },
  { id: 'gpu-generic', pattern: 'gpu-firmware-kmod', description: 'generic GPU firmware' },
  { id: 'wifi', pattern: 'wifi-firmware-', description: 'WiFi firmware' },
  { id: 'broadcom-wifi', pattern: 'bw[in]-firmware-kmod', description: 'Broadcom bwi/bwn WiFi firmware' },
  { id: 'marvell-wifi', pattern: 'malo-firmware-kmod', description: 'Marvell WiFi firmware' },
  { id: 'intel', pattern: 'intel-firmware', description: 'Intel firmware' },
  { id: 'bluetooth', pattern: 'b(luetooth|roadcom)-firmware', description: 'Bluetooth and Broadcom firmware' },
  { id: 'realtek-bt', pattern: 'rtlbt-firmware', description: 'Realtek Bluetooth firmware' },
];

/**
 * Anchored alternation of every managed family, as passed to `pkg query -x`.
 */
export const managedFirmwarePattern = (families: readonly FirmwareFamily[] = MANAGED_FAMILIES): string =>
  `^(${families.map((family) => family.pattern).join('|')})`;

const MANAGED_FIRMWARE_RE = new RegExp(managedFirmwarePattern());

export const isManagedFirmware = (name: string): boolean => MANAGED_FIRMWARE_RE.test(name);

export const findFamily = (name: string): FirmwareFamily | undefined =>
  MANAGED_FAMILIES.find((family) => new RegExp(`^(${family.pattern})`).test(name));

/**
 * Package names keyed by family id, in input order. Unmanaged names are left out.
 */
export const groupByFamily = (packages: Iterable<string>): Record<string, string[]> => {
  const groups: Record<string, string[]> = {};
  for (const name of packages) {
    const family = findFamily(name);
    if (family) {
      groups[family.id] = [...(groups[family.id] ?? []), name];
    }
  }
  return groups;
};
