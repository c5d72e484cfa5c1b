import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import fc from 'fast-check';
import { CrxBinary, CrxDecodeError } from '../src/crx-binary.js';
import type { CrxDecodeErrorKind } from '../src/crx-binary.js';
import { MAGIC, SAMPLE_ZIP, buildCrx2, buildCrx3, emptyZip, nestCrx3, u32le } from './helpers.js';

const PROPERTY_CONFIG = {
  numRuns: 200,
  seed: 0x43723234
} as const;

function decodeFailure(raw: Uint8Array, maxNestingDepth?: number): CrxDecodeError {
  try {
    CrxBinary.decode(raw, { maxNestingDepth });
  } catch (error) {
    assert.ok(error instanceof CrxDecodeError, `expected CrxDecodeError, got ${String(error)}`);
    return error;
  }
  assert.fail('expected decode to fail');
}

function assertKind(raw: Uint8Array, kind: CrxDecodeErrorKind): CrxDecodeError {
  const error = decodeFailure(raw);
  assert.equal(error.kind, kind);
  return error;
}

test('version 3 round-trips the payload for header data lengths 0, 1 and 4096', () => {
  for (const headerDataLength of [0, 1, 4096]) {
    const { payload, metadata } = CrxBinary.decode(buildCrx3(SAMPLE_ZIP, headerDataLength));
    assert.deepEqual(payload, SAMPLE_ZIP);
    assert.equal(metadata.formatVersion, 3);
    assert.equal(metadata.nestingDepth, 0);
    assert.equal(metadata.payloadLength, SAMPLE_ZIP.length);
    assert.deepEqual(metadata.layers, [{ version: 3, headerDataLength, headerSize: 12 + headerDataLength }]);
  }
});

test('version 2 with empty key and signature decodes to the payload', () => {
  const { payload, metadata } = CrxBinary.decode(buildCrx2(SAMPLE_ZIP, 0, 0));
  assert.deepEqual(payload, SAMPLE_ZIP);
  assert.equal(metadata.formatVersion, 2);
  assert.deepEqual(metadata.layers, [{ version: 2, publicKeyLength: 0, signatureLength: 0, headerSize: 16 }]);
});

test('version 2 skips the public key and signature blocks', () => {
  const { payload, metadata } = CrxBinary.decode(buildCrx2(SAMPLE_ZIP, 162, 128));
  assert.deepEqual(payload, SAMPLE_ZIP);
  assert.deepEqual(metadata.layers, [{ version: 2, publicKeyLength: 162, signatureLength: 128, headerSize: 306 }]);
});

test('empty zip behind a version 3 header decodes unchanged', () => {
  const zip = emptyZip();
  const raw = Buffer.concat([Buffer.from('Cr24', 'ascii'), u32le(3), u32le(0), zip]);
  const { payload, metadata } = CrxBinary.decode(raw);
  assert.deepEqual(payload, zip);
  assert.equal(metadata.formatVersion, 3);
  assert.equal(metadata.nestingDepth, 0);
  assert.equal(metadata.payloadLength, 22);
});

test('property: any prefix other than Cr24 fails with BadMagic', () => {
  fc.assert(
    fc.property(
      fc
        .uint8Array({ minLength: 4, maxLength: 1000 })
        .filter((bytes) => !(bytes[0] === 0x43 && bytes[1] === 0x72 && bytes[2] === 0x32 && bytes[3] === 0x34)),
      (bytes) => {
        assert.equal(decodeFailure(bytes).kind, 'BadMagic');
      }
    ),
    PROPERTY_CONFIG
  );
});

test('bad magic is reported before anything else is parsed', () => {
  assertKind(SAMPLE_ZIP, 'BadMagic');
  // High-bit bytes must not be folded onto ASCII "Cr24".
  assertKind(Buffer.from([0xc3, 0xf2, 0xb2, 0xb4, 3, 0, 0, 0, 0, 0, 0, 0]), 'BadMagic');
});

test('inputs shorter than the magic fail with TooShort', () => {
  for (const length of [0, 1, 2, 3]) {
    const error = assertKind(MAGIC.subarray(0, length), 'TooShort');
    assert.equal(error.context.length, length);
  }
});

test('partial headers fail with Truncated', () => {
  assertKind(MAGIC, 'Truncated');
  assertKind(Buffer.concat([MAGIC, Buffer.from([3, 0])]), 'Truncated');
  assertKind(Buffer.concat([MAGIC, u32le(3)]), 'Truncated');
  assertKind(Buffer.concat([MAGIC, u32le(3), Buffer.from([0, 0])]), 'Truncated');
  assertKind(Buffer.concat([MAGIC, u32le(2), u32le(0)]), 'Truncated');
  assertKind(Buffer.concat([MAGIC, u32le(2), u32le(0), Buffer.from([0])]), 'Truncated');
});

test('property: a declared header length beyond the input fails with Truncated', () => {
  fc.assert(
    fc.property(fc.uint8Array({ maxLength: 300 }), fc.integer({ min: 1, max: 0x7fffffff }), (content, excess) => {
      const declared = Math.min(0xffffffff, 4 + content.length + excess);
      const raw = Buffer.concat([MAGIC, u32le(3), u32le(declared), content]);
      const error = decodeFailure(raw);
      assert.equal(error.kind, 'Truncated');
      assert.equal(error.context.offset, 12 + declared);
      assert.equal(error.context.length, raw.length);
    }),
    PROPERTY_CONFIG
  );
});

test('version 2 key and signature lengths that overflow the input fail with Truncated', () => {
  const body = Buffer.alloc(10);
  assertKind(Buffer.concat([MAGIC, u32le(2), u32le(11), u32le(0), body]), 'Truncated');
  assertKind(Buffer.concat([MAGIC, u32le(2), u32le(6), u32le(5), body]), 'Truncated');
  assertKind(Buffer.concat([MAGIC, u32le(2), u32le(0xffffffff), u32le(0xffffffff), body]), 'Truncated');
});

test('a truncated error is the only retryable kind', () => {
  assert.equal(assertKind(Buffer.concat([MAGIC, u32le(3), u32le(50)]), 'Truncated').retryable, true);
  assert.equal(assertKind(Buffer.from('nope'), 'BadMagic').retryable, false);
});

test('versions 1 and 999999 fail with UnsupportedVersion carrying the value', () => {
  for (const version of [1, 999999]) {
    const error = assertKind(Buffer.concat([MAGIC, u32le(version), u32le(0), SAMPLE_ZIP]), 'UnsupportedVersion');
    assert.equal(error.context.version, version);
    assert.equal(error.message, `Unsupported CRX format version: ${version}`);
  }
});

test('a payload that is neither zip nor crx fails with UnrecognizedPayload', () => {
  const error = assertKind(buildCrx3(Buffer.from('hello world')), 'UnrecognizedPayload');
  assert.equal(error.context.offset, 12);
  assert.equal(error.context.length, 11);
  assertKind(buildCrx3(Buffer.alloc(0)), 'UnrecognizedPayload');
  assertKind(buildCrx3(Buffer.from('PK')), 'UnrecognizedPayload');
});

test('a single nested container unwraps to the innermost archive', () => {
  const raw = buildCrx3(buildCrx2(SAMPLE_ZIP, 8, 8), 32);
  const { payload, metadata } = CrxBinary.decode(raw);
  assert.deepEqual(payload, SAMPLE_ZIP);
  assert.equal(metadata.formatVersion, 3);
  assert.equal(metadata.nestingDepth, 1);
  assert.equal(metadata.payloadLength, SAMPLE_ZIP.length);
  assert.deepEqual(
    metadata.layers.map((layer) => layer.version),
    [3, 2]
  );
});

test('a chain of 6 containers exceeds the default depth of 5', () => {
  const error = assertKind(nestCrx3(SAMPLE_ZIP, 6), 'NestingTooDeep');
  assert.equal(error.context.depth, 5);
});

test('a chain of 5 containers is within the default depth', () => {
  const { payload, metadata } = CrxBinary.decode(nestCrx3(SAMPLE_ZIP, 5));
  assert.deepEqual(payload, SAMPLE_ZIP);
  assert.equal(metadata.nestingDepth, 4);
  assert.equal(metadata.layers.length, 5);
});

test('maxNestingDepth bounds the unwrap', () => {
  const nested = nestCrx3(SAMPLE_ZIP, 2);
  assert.equal(decodeFailure(nested, 1).kind, 'NestingTooDeep');
  assert.equal(CrxBinary.decode(nested, { maxNestingDepth: 2 }).metadata.nestingDepth, 1);
  assert.throws(() => CrxBinary.decode(nested, { maxNestingDepth: 0 }), RangeError);
});

test('a failure inside a nested container keeps its own kind', () => {
  const inner = Buffer.concat([MAGIC, u32le(7), SAMPLE_ZIP]);
  const error = assertKind(buildCrx3(inner), 'UnsupportedVersion');
  assert.equal(error.context.depth, 1);
  assert.equal(error.context.version, 7);
});

test('property: decoding the same bytes twice gives identical results', () => {
  const candidate = fc.oneof(
    fc.uint8Array({ maxLength: 64 }),
    fc.uint8Array({ maxLength: 64 }).map((tail) => Buffer.concat([MAGIC, tail])),
    fc.tuple(fc.integer({ min: 0, max: 40 }), fc.constantFrom(SAMPLE_ZIP, emptyZip())).map(([length, zip]) => buildCrx3(zip, length))
  );
  fc.assert(
    fc.property(candidate, (raw) => {
      const outcome = (): { ok: true; payload: Buffer } | { ok: false; kind: string } => {
        try {
          return { ok: true, payload: CrxBinary.decode(raw).payload };
        } catch (error) {
          assert.ok(error instanceof CrxDecodeError);
          return { ok: false, kind: error.kind };
        }
      };
      assert.deepEqual(outcome(), outcome());
    }),
    PROPERTY_CONFIG
  );
});

test('the returned payload is a copy of the input bytes', () => {
  const raw = buildCrx3(SAMPLE_ZIP, 4);
  const { payload } = CrxBinary.decode(raw);
  payload[0] = 0;
  assert.equal(raw[16], 0x50);
  assert.deepEqual(CrxBinary.decode(raw).payload, SAMPLE_ZIP);
});

test('plain Uint8Array views are decoded from their own offset', () => {
  const framed = Buffer.concat([Buffer.from('junk'), buildCrx3(SAMPLE_ZIP, 2)]);
  const view = new Uint8Array(framed.buffer, framed.byteOffset + 4, framed.length - 4);
  assert.deepEqual(CrxBinary.decode(view).payload, SAMPLE_ZIP);
});

test('isZip and isCrx recognize the leading signatures', () => {
  assert.equal(CrxBinary.isZip(SAMPLE_ZIP), true);
  assert.equal(CrxBinary.isZip(emptyZip()), true);
  assert.equal(CrxBinary.isZip(buildCrx3(SAMPLE_ZIP)), false);
  assert.equal(CrxBinary.isCrx(buildCrx3(SAMPLE_ZIP)), true);
  assert.equal(CrxBinary.isCrx(Buffer.from('Cr2')), false);
});

test('read decodes a package from disk', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'crx-unpack-read-'));
  try {
    const filePath = join(dir, 'sample.crx');
    await writeFile(filePath, buildCrx3(SAMPLE_ZIP, 64));
    const { payload, metadata } = await CrxBinary.read({ filePath });
    assert.deepEqual(payload, SAMPLE_ZIP);
    assert.equal(metadata.layers[0]?.headerSize, 76);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
});
