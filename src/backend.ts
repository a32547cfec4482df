/**
 * LOI-level operations on top of the storage backend, as used by the HTTP
 * server and the local client.
 */

import {
  AlreadyExistsError,
  InvalidLoiError,
  LoiNotFoundError,
  MissingContentError,
  MissingLoiError,
  NotEmptyError,
} from './errors.js';
import { createChildLogger } from './logger.js';
import { checkLoi, isDate, type CheckerId } from './loi-checker.js';
import { parseLoi, type Loi } from './loi.js';
import type { IntegrityReport } from './manifest.js';
import type { StorageBackend } from './storage.js';

/** New dataset LOIs may name the measurement number or leave it out. */
const CREATE_SKIP: ReadonlySet<CheckerId> = new Set<CheckerId>(['measurementNumber']);

export class Backend {
  private readonly log = createChildLogger({ component: 'backend' });

  constructor(readonly storage: StorageBackend) {}

  /**
   * Allocate a new dataset LOI below the prefix of `loi`.
   *
   * `42.1001/ds/exp/sa/42/cwepr` (or any LOI with that prefix) yields
   * `42.1001/ds/exp/sa/42/cwepr/<n>` with the next free number.
   *
   * @throws {MissingLoiError} for an empty LOI
   * @throws {InvalidLoiError} unless it is an experimental dataset LOI
   */
  async create(loi: string): Promise<string> {
    if (!loi) throw new MissingLoiError();
    const parsed = parseLoi(loi);
    const idPath = parsed.idPath;
    if (parsed.type !== 'ds' || idPath[0] !== 'exp') {
      throw new InvalidLoiError('Only experimental dataset LOIs can be created.', { loi });
    }
    if (!checkLoi(loi, { skip: CREATE_SKIP })) {
      throw new InvalidLoiError(undefined, { loi });
    }

    const prefix = (isDate(idPath[1]) ? idPath.slice(0, 3) : idPath.slice(0, 4)).join('/');
    try {
      await this.storage.create(prefix);
    } catch (error) {
      // Concurrent allocations may create the same new prefix
      if (!(error instanceof AlreadyExistsError)) throw error;
    }
    const path = await this.storage.createNextId(prefix);
    const created = parsed.withIdPath(path.split('/')).toString();
    this.log.info({ loi: created }, 'Created LOI');
    return created;
  }

  /**
   * Deposit the first content of a reserved LOI.
   *
   * @throws {LoiNotFoundError} if the LOI has no storage slot
   * @throws {NotEmptyError} if the slot holds content already
   */
  async upload(loi: string, content: Uint8Array | undefined): Promise<IntegrityReport> {
    const path = await this.existingPath(loi);
    if (!(await this.storage.isEmpty(path))) {
      throw new NotEmptyError(undefined, { loi });
    }
    const report = await this.storage.deposit(path, content);
    this.log.info({ loi, ...report }, 'Uploaded content');
    return report;
  }

  /**
   * Replace the content of a LOI.
   *
   * @throws {LoiNotFoundError} if the LOI has no storage slot
   * @throws {MissingContentError} for empty content
   */
  async update(loi: string, content: Uint8Array | undefined): Promise<IntegrityReport> {
    const path = await this.existingPath(loi);
    if (!content || content.length === 0) throw new MissingContentError();
    await this.storage.remove(path, true);
    await this.storage.create(path);
    const report = await this.storage.deposit(path, content);
    this.log.info({ loi, ...report }, 'Updated content');
    return report;
  }

  /**
   * ZIP archive of the content of a LOI.
   *
   * @throws {LoiNotFoundError} if the LOI has no storage slot
   * @throws {MissingContentError} if the slot is empty
   */
  async download(loi: string): Promise<Buffer> {
    const path = await this.existingPath(loi);
    if (await this.storage.isEmpty(path)) {
      throw new MissingContentError('LOI does not have content.', { loi });
    }
    return this.storage.retrieve(path);
  }

  async checkIntegrity(loi: string): Promise<IntegrityReport> {
    return this.storage.checkIntegrity(await this.existingPath(loi));
  }

  /** Storage paths of all reserved and occupied slots. */
  async index(): Promise<string[]> {
    return this.storage.getIndex();
  }

  /**
   * Fully valid dataset LOI.
   *
   * @throws {MissingLoiError} for an empty LOI
   * @throws {InvalidLoiError} if the LOI is not a valid dataset LOI
   */
  parse(loi: string): Loi {
    if (!loi) throw new MissingLoiError();
    if (!checkLoi(loi)) throw new InvalidLoiError(undefined, { loi });
    const parsed = parseLoi(loi);
    if (parsed.type !== 'ds') {
      throw new InvalidLoiError('LOI is not a dataset LOI.', { loi });
    }
    return parsed;
  }

  private async existingPath(loi: string): Promise<string> {
    const path = this.parse(loi).id;
    if (!(await this.storage.exists(path))) {
      throw new LoiNotFoundError(undefined, { loi });
    }
    return path;
  }
}
