/**
 * CRC-16/ARC (多項式 0x8005 反転, 初期値 0x0000) を計算します。
 * DSMR 4以降のP1電文の末尾 `!XXXX` に付与されるチェックサムです。
 */
export function crc16(data: Buffer): number {
  let crc = 0x0000;
  for (const byte of data) {
    crc ^= byte;
    for (let bit = 0; bit < 8; bit++) {
      crc = crc & 0x0001 ? (crc >>> 1) ^ 0xa001 : crc >>> 1;
    }
  }
  return crc;
}

export function formatCrc16(crc: number): string {
  return crc.toString(16).toUpperCase().padStart(4, "0");
}
