/**
 * Builders for CRX and ZIP fixtures used across the test suite.
 */
import AdmZip from 'adm-zip';

export function u32le(value: number): Buffer {
  const buffer = Buffer.alloc(4);
  buffer.writeUInt32LE(value >>> 0, 0);
  return buffer;
}

export const MAGIC: Buffer = Buffer.from('Cr24', 'ascii');

/** 22-byte end of central directory record with no entries. */
export function emptyZip(): Buffer {
  return Buffer.concat([Buffer.from([0x50, 0x4b, 0x05, 0x06]), Buffer.alloc(18)]);
}

/**
 * ZIP archive holding the given files, written by adm-zip.
 */
export function buildZip(files: ReadonlyArray<{ readonly name: string; readonly data: string }>): Buffer {
  const zip = new AdmZip();
  for (const file of files) {
    zip.addFile(file.name, Buffer.from(file.data, 'utf8'));
  }
  return zip.toBuffer();
}

export function buildCrx3(payload: Uint8Array, headerDataLength = 0): Buffer {
  return Buffer.concat([MAGIC, u32le(3), u32le(headerDataLength), Buffer.alloc(headerDataLength, 0x0a), payload]);
}

export function buildCrx2(payload: Uint8Array, publicKeyLength = 0, signatureLength = 0): Buffer {
  return Buffer.concat([
    MAGIC,
    u32le(2),
    u32le(publicKeyLength),
    u32le(signatureLength),
    Buffer.alloc(publicKeyLength, 0x30),
    Buffer.alloc(signatureLength, 0x5a),
    payload
  ]);
}

/** Wraps `payload` in `layers` CRX3 containers. */
export function nestCrx3(payload: Uint8Array, layers: number): Buffer {
  let current: Buffer = Buffer.from(payload);
  for (let i = 0; i < layers; i += 1) {
    current = buildCrx3(current, 4);
  }
  return current;
}

export const SAMPLE_ZIP: Buffer = buildZip([
  { name: 'background.js', data: 'console.log("sample");\n' },
  { name: 'manifest.json', data: '{"manifest_version":3,"name":"Sample","version":"1.0.0"}' }
]);

export const VALID_ID = 'gppongmhjkpfnbhagpmjfkannfbllamg';
export const OTHER_ID = 'nkeimhogjdpnpccoofpliimaahmaaome';
