import { PropertyRegistry } from '../../src/PropertyRegistry';
import { MemoryPropertyStore } from '../../src/storage/MemoryPropertyStore';
import { PropertyCategories } from '../../src/category';
import { PropertyRecord } from '../../src/types';
import { LockError, ValidationError } from '../../src/errors';
import * as crypto from 'crypto';

jest.mock('fs-extra', () => ({
  readFile: jest.fn(),
}));

import fs from 'fs-extra';

const readFileMock = fs.readFile as unknown as jest.Mock;

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

const sha256 = (bytes: number[]) =>
  crypto.createHash('sha256').update(Buffer.from(bytes)).digest('hex');

// Store whose writes wait until the test opens the gate
class GatedStore extends MemoryPropertyStore {
  public gate: Promise<void> = Promise.resolve();

  async put(record: PropertyRecord): Promise<boolean> {
    await this.gate;
    return super.put(record);
  }
}

class FailingStore extends MemoryPropertyStore {
  async put(): Promise<boolean> {
    throw new Error('store unavailable');
  }
}

describe('PropertyRegistry', () => {
  let registry: PropertyRegistry;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    jest.clearAllMocks();
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    registry = new PropertyRegistry({ silent: true });
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  describe('uploadProperty', () => {
    it('should store the record and return the image digest', async () => {
      const digest = await registry.uploadProperty(
        'p1',
        PropertyCategories.realEstate(),
        Uint8Array.from([0x01, 0x02]),
        'lake house',
        'alice',
      );

      expect(digest).toBe(sha256([0x01, 0x02]));
      await expect(registry.getPropertyById('p1')).resolves.toEqual({
        id: 'p1',
        category: { kind: 'RealEstate' },
        imageDigest: digest,
        description: 'lake house',
        owner: 'alice',
      });
    });

    it('should replace an existing record with the same id', async () => {
      await registry.uploadProperty('p1', PropertyCategories.car(), Uint8Array.from([1]), 'sedan', 'bob');
      const digest = await registry.uploadProperty(
        'p1',
        PropertyCategories.other('boat'),
        Uint8Array.from([2]),
        'sailboat',
        'carol',
      );

      await expect(registry.getPropertyById('p1')).resolves.toEqual({
        id: 'p1',
        category: { kind: 'Other', label: 'boat' },
        imageDigest: digest,
        description: 'sailboat',
        owner: 'carol',
      });
      await expect(registry.size()).resolves.toBe(1);
    });

    it('should reject empty image data without changing state', async () => {
      await expect(
        registry.uploadProperty('p1', PropertyCategories.art(), new Uint8Array(0), 'sketch', 'dave'),
      ).rejects.toThrow(ValidationError);

      await expect(registry.hasProperty('p1')).resolves.toBe(false);
      await expect(registry.size()).resolves.toBe(0);
    });

    it('should report the empty image with a validation code', async () => {
      const error = await registry
        .uploadProperty('p1', PropertyCategories.art(), new Uint8Array(0), 'sketch', 'dave')
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'Image data is empty.',
      });
    });

    it('should not let later changes to the category argument reach the store', async () => {
      const category = { kind: 'Other' as const, label: 'boat' };
      await registry.uploadProperty('p1', category, Uint8Array.from([1]), 'dinghy', 'erin');

      category.label = 'plane';

      const record = await registry.getPropertyById('p1');
      expect(record?.category).toEqual({ kind: 'Other', label: 'boat' });
    });
  });

  describe('uploadPropertyFromFile', () => {
    it('should hash the file contents', async () => {
      readFileMock.mockResolvedValueOnce(Buffer.from([0x01, 0x02]));

      const digest = await registry.uploadPropertyFromFile(
        'p1',
        PropertyCategories.realEstate(),
        '/images/lake-house.jpg',
        'lake house',
        'alice',
      );

      expect(readFileMock).toHaveBeenCalledWith('/images/lake-house.jpg');
      expect(digest).toBe(sha256([0x01, 0x02]));
      await expect(registry.hasProperty('p1')).resolves.toBe(true);
    });

    it('should reject an empty file', async () => {
      readFileMock.mockResolvedValueOnce(Buffer.alloc(0));

      await expect(
        registry.uploadPropertyFromFile('p1', PropertyCategories.car(), '/images/empty.jpg', 'x', 'y'),
      ).rejects.toThrow('Image data is empty.');
      await expect(registry.size()).resolves.toBe(0);
    });
  });

  describe('getPropertyById', () => {
    it('should return undefined for a missing id', async () => {
      await expect(registry.getPropertyById('missing')).resolves.toBeUndefined();
    });

    it('should return copies that do not affect stored state', async () => {
      await registry.uploadProperty('p1', PropertyCategories.other('boat'), Uint8Array.from([1]), 'dinghy', 'erin');

      const first = await registry.getPropertyById('p1');
      if (!first || first.category.kind !== 'Other') {
        throw new Error('expected an Other record');
      }
      first.description = 'changed';
      first.category.label = 'changed';

      const second = await registry.getPropertyById('p1');
      expect(second?.description).toBe('dinghy');
      expect(second?.category).toEqual({ kind: 'Other', label: 'boat' });
    });
  });

  describe('getProperties', () => {
    it('should return an empty list for an empty registry', async () => {
      await expect(registry.getProperties()).resolves.toEqual([]);
    });

    it('should list exactly the present records with their current digests', async () => {
      await registry.uploadProperty('p1', PropertyCategories.realEstate(), Uint8Array.from([1]), 'a', 'alice');
      await registry.uploadProperty('p2', PropertyCategories.car(), Uint8Array.from([2]), 'b', 'bob');
      await registry.uploadProperty('p3', PropertyCategories.other('boat'), Uint8Array.from([3]), 'c', 'carol');
      await registry.deleteProperty('p2');
      await registry.uploadProperty('p1', PropertyCategories.art(), Uint8Array.from([4]), 'd', 'alice');

      const properties = await registry.getProperties();

      expect(properties).toHaveLength(2);
      expect(properties).toEqual(
        expect.arrayContaining([
          { id: 'p1', categoryName: 'Art', imageDigest: sha256([4]) },
          { id: 'p3', categoryName: 'Other("boat")', imageDigest: sha256([3]) },
        ]),
      );
    });

    it('should return a snapshot unaffected by later mutations', async () => {
      await registry.uploadProperty('p1', PropertyCategories.car(), Uint8Array.from([1]), 'a', 'alice');

      const snapshot = await registry.getProperties();
      await registry.deleteProperty('p1');
      await registry.uploadProperty('p2', PropertyCategories.car(), Uint8Array.from([2]), 'b', 'bob');

      expect(snapshot).toEqual([{ id: 'p1', categoryName: 'Car', imageDigest: sha256([1]) }]);
    });
  });

  describe('deleteProperty', () => {
    it('should remove a present record and return true', async () => {
      await registry.uploadProperty('p1', PropertyCategories.realEstate(), Uint8Array.from([1, 2]), 'lake house', 'alice');

      await expect(registry.deleteProperty('p1')).resolves.toBe(true);
      await expect(registry.getPropertyById('p1')).resolves.toBeUndefined();
    });

    it('should return false for a missing id and leave the registry unchanged', async () => {
      await registry.uploadProperty('p1', PropertyCategories.car(), Uint8Array.from([1]), 'a', 'alice');

      await expect(registry.deleteProperty('p2')).resolves.toBe(false);
      await expect(registry.size()).resolves.toBe(1);
    });
  });

  describe('locking', () => {
    it('should hold reads until a pending write completes', async () => {
      const store = new GatedStore();
      let open: () => void = () => undefined;
      store.gate = new Promise<void>((resolve) => {
        open = resolve;
      });
      registry = new PropertyRegistry({ store, silent: true });

      const upload = registry.uploadProperty(
        'p1',
        PropertyCategories.realEstate(),
        Uint8Array.from([1, 2]),
        'lake house',
        'alice',
      );
      await flush();

      let readDone = false;
      const read = registry.getPropertyById('p1').then((record) => {
        readDone = true;
        return record;
      });
      await flush();
      expect(readDone).toBe(false);

      open();
      await upload;
      const record = await read;

      expect(record?.description).toBe('lake house');
    });

    it('should fail later calls after a store error during a write', async () => {
      registry = new PropertyRegistry({ store: new FailingStore(), silent: true });

      await expect(
        registry.uploadProperty('p1', PropertyCategories.car(), Uint8Array.from([1]), 'a', 'alice'),
      ).rejects.toThrow('store unavailable');

      await expect(registry.getPropertyById('p1')).rejects.toThrow(LockError);
      await expect(registry.deleteProperty('p1')).rejects.toThrow(LockError);
    });
  });

  describe('logging', () => {
    let logSpy: jest.SpyInstance;

    beforeEach(() => {
      logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      registry = new PropertyRegistry();
    });

    afterEach(() => {
      logSpy.mockRestore();
    });

    it('should log stored, replaced and deleted properties', async () => {
      const digest = sha256([1, 2]);

      await registry.uploadProperty('p1', PropertyCategories.realEstate(), Uint8Array.from([1, 2]), 'a', 'alice');
      await registry.uploadProperty('p1', PropertyCategories.other('boat'), Uint8Array.from([1, 2]), 'b', 'alice');
      await registry.deleteProperty('p1');
      await registry.deleteProperty('p1');

      expect(logSpy.mock.calls).toEqual([
        [`✅ Stored property p1 (RealEstate) with image ${digest}`],
        [`♻️ Replaced property p1 (Other("boat")) with image ${digest}`],
        ['🗑️ Deleted property p1'],
      ]);
    });

    it('should log a rejected upload as an error', async () => {
      await registry
        .uploadProperty('p9', PropertyCategories.car(), new Uint8Array(0), 'a', 'alice')
        .catch(() => undefined);

      expect(errorSpy).toHaveBeenCalledWith('❌ Rejected upload for property p9: image data is empty');
      expect(logSpy).not.toHaveBeenCalled();
    });

    it('should stay quiet when silent', async () => {
      registry = new PropertyRegistry({ silent: true });

      await registry.uploadProperty('p1', PropertyCategories.car(), Uint8Array.from([1]), 'a', 'alice');
      await registry.deleteProperty('p1');

      expect(logSpy).not.toHaveBeenCalled();
    });
  });
});
