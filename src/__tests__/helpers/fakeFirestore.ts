/**
 * In-process Firestore stand-in for repository and service tests.
 *
 * Covers the surface the repositories use: document get/set/update/delete/create,
 * equality queries, write batches and transactions. Transactions buffer their
 * writes and commit atomically; a commit whose reads changed underneath it is
 * retried, so concurrent callers observe each other the way they would against
 * the real backend.
 */

type DocumentData = Record<string, unknown>;

type Filter = { field: string; value: unknown };

type PendingWrite =
  | { kind: 'create'; path: string; data: DocumentData }
  | { kind: 'set'; path: string; data: DocumentData; merge: boolean }
  | { kind: 'update'; path: string; data: DocumentData }
  | { kind: 'delete'; path: string };

const GRPC_NOT_FOUND = 5;
const GRPC_ALREADY_EXISTS = 6;
const GRPC_ABORTED = 10;
const MAX_TRANSACTION_ATTEMPTS = 5;

export class FakeFirestoreError extends Error {
  constructor(
    readonly code: number,
    message: string,
  ) {
    super(message);
    this.name = 'FakeFirestoreError';
  }
}

export class FakeDocumentSnapshot {
  constructor(
    readonly ref: FakeDocumentReference,
    private readonly value: DocumentData | undefined,
  ) {}

  get id(): string {
    return this.ref.id;
  }

  get exists(): boolean {
    return this.value !== undefined;
  }

  data(): DocumentData | undefined {
    return this.value ? { ...this.value } : undefined;
  }
}

export class FakeQuerySnapshot {
  constructor(readonly docs: FakeDocumentSnapshot[]) {}

  get size(): number {
    return this.docs.length;
  }

  get empty(): boolean {
    return this.docs.length === 0;
  }

  forEach(callback: (doc: FakeDocumentSnapshot) => void): void {
    this.docs.forEach(callback);
  }
}

export class FakeDocumentReference {
  constructor(
    private readonly db: FakeFirestore,
    readonly collectionName: string,
    readonly id: string,
  ) {}

  get path(): string {
    return `${this.collectionName}/${this.id}`;
  }

  async get(): Promise<FakeDocumentSnapshot> {
    return this.db.snapshotOf(this);
  }

  async create(data: DocumentData): Promise<void> {
    this.db.applyWrites([{ kind: 'create', path: this.path, data }]);
  }

  async set(data: DocumentData, options: { merge?: boolean } = {}): Promise<void> {
    this.db.applyWrites([{ kind: 'set', path: this.path, data, merge: options.merge === true }]);
  }

  async update(data: DocumentData): Promise<void> {
    this.db.applyWrites([{ kind: 'update', path: this.path, data }]);
  }

  async delete(): Promise<void> {
    this.db.applyWrites([{ kind: 'delete', path: this.path }]);
  }
}

export class FakeQuery {
  constructor(
    protected readonly db: FakeFirestore,
    readonly collectionName: string,
    readonly filters: readonly Filter[] = [],
  ) {}

  where(field: string, op: string, value: unknown): FakeQuery {
    if (op !== '==') {
      throw new Error(`FakeFirestore supports only '==' filters (got '${op}')`);
    }
    return new FakeQuery(this.db, this.collectionName, [...this.filters, { field, value }]);
  }

  async get(): Promise<FakeQuerySnapshot> {
    return this.db.runQuery(this);
  }
}

export class FakeCollectionReference extends FakeQuery {
  constructor(db: FakeFirestore, collectionName: string) {
    super(db, collectionName);
  }

  doc(id?: string): FakeDocumentReference {
    return new FakeDocumentReference(this.db, this.collectionName, id ?? this.db.nextAutoId());
  }
}

export class FakeWriteBatch {
  private readonly writes: PendingWrite[] = [];

  constructor(private readonly db: FakeFirestore) {}

  create(ref: FakeDocumentReference, data: DocumentData): this {
    this.writes.push({ kind: 'create', path: ref.path, data });
    return this;
  }

  set(ref: FakeDocumentReference, data: DocumentData, options: { merge?: boolean } = {}): this {
    this.writes.push({ kind: 'set', path: ref.path, data, merge: options.merge === true });
    return this;
  }

  update(ref: FakeDocumentReference, data: DocumentData): this {
    this.writes.push({ kind: 'update', path: ref.path, data });
    return this;
  }

  delete(ref: FakeDocumentReference): this {
    this.writes.push({ kind: 'delete', path: ref.path });
    return this;
  }

  async commit(): Promise<void> {
    this.db.applyWrites(this.writes);
  }
}

export class FakeTransaction {
  readonly writes: PendingWrite[] = [];
  readonly readVersions = new Map<string, number>();
  readonly queryReads: Array<{ query: FakeQuery; signature: string }> = [];

  constructor(private readonly db: FakeFirestore) {}

  async get(target: FakeDocumentReference | FakeQuery): Promise<FakeDocumentSnapshot | FakeQuerySnapshot> {
    if (this.writes.length > 0) {
      throw new Error('Firestore transactions require all reads to be executed before all writes.');
    }

    if (target instanceof FakeDocumentReference) {
      this.readVersions.set(target.path, this.db.versionOf(target.path));
      return this.db.snapshotOf(target);
    }

    const snapshot = this.db.runQuery(target);
    this.queryReads.push({ query: target, signature: this.db.querySignature(target) });
    snapshot.docs.forEach((doc) => this.readVersions.set(doc.ref.path, this.db.versionOf(doc.ref.path)));
    return snapshot;
  }

  create(ref: FakeDocumentReference, data: DocumentData): this {
    this.writes.push({ kind: 'create', path: ref.path, data });
    return this;
  }

  set(ref: FakeDocumentReference, data: DocumentData, options: { merge?: boolean } = {}): this {
    this.writes.push({ kind: 'set', path: ref.path, data, merge: options.merge === true });
    return this;
  }

  update(ref: FakeDocumentReference, data: DocumentData): this {
    this.writes.push({ kind: 'update', path: ref.path, data });
    return this;
  }

  delete(ref: FakeDocumentReference): this {
    this.writes.push({ kind: 'delete', path: ref.path });
    return this;
  }
}

export class FakeFirestore {
  private readonly documents = new Map<string, DocumentData>();
  private readonly versions = new Map<string, number>();
  private autoIdCounter = 0;
  private clock = 0;

  readonly settingsCalls: DocumentData[] = [];
  transactionAttempts = 0;

  collection(name: string): FakeCollectionReference {
    return new FakeCollectionReference(this, name);
  }

  batch(): FakeWriteBatch {
    return new FakeWriteBatch(this);
  }

  settings(settings: DocumentData): void {
    this.settingsCalls.push(settings);
  }

  async runTransaction<T>(updateFunction: (tx: FakeTransaction) => Promise<T>): Promise<T> {
    for (let attempt = 1; attempt <= MAX_TRANSACTION_ATTEMPTS; attempt++) {
      this.transactionAttempts += 1;
      const tx = new FakeTransaction(this);
      const result = await updateFunction(tx);

      if (this.isStale(tx)) {
        continue;
      }
      this.applyWrites(tx.writes);
      return result;
    }
    throw new FakeFirestoreError(GRPC_ABORTED, 'Transaction contention: too many retries');
  }

  /** Typed view for code that takes the Admin SDK client. */
  asFirestore(): FirebaseFirestore.Firestore {
    return this as unknown as FirebaseFirestore.Firestore;
  }

  seed(path: string, data: DocumentData): void {
    this.documents.set(path, { ...data });
    this.bump(path);
  }

  read(path: string): DocumentData | undefined {
    const data = this.documents.get(path);
    return data ? { ...data } : undefined;
  }

  /** Document ids of one collection, sorted. */
  ids(collectionName: string): string[] {
    const prefix = `${collectionName}/`;
    return Array.from(this.documents.keys())
      .filter((path) => path.startsWith(prefix))
      .map((path) => path.slice(prefix.length))
      .sort();
  }

  nextAutoId(): string {
    this.autoIdCounter += 1;
    return `auto${String(this.autoIdCounter).padStart(4, '0')}`;
  }

  versionOf(path: string): number {
    return this.versions.get(path) ?? 0;
  }

  snapshotOf(ref: FakeDocumentReference): FakeDocumentSnapshot {
    return new FakeDocumentSnapshot(ref, this.read(ref.path));
  }

  runQuery(query: FakeQuery): FakeQuerySnapshot {
    const docs = this.ids(query.collectionName)
      .map((id) => new FakeDocumentReference(this, query.collectionName, id))
      .map((ref) => this.snapshotOf(ref))
      .filter((snapshot) => {
        const data = snapshot.data();
        return data !== undefined && query.filters.every((filter) => data[filter.field] === filter.value);
      });
    return new FakeQuerySnapshot(docs);
  }

  querySignature(query: FakeQuery): string {
    return this.runQuery(query)
      .docs.map((doc) => `${doc.ref.path}@${this.versionOf(doc.ref.path)}`)
      .join('|');
  }

  /**
   * Applies a group of writes atomically: every precondition is checked before
   * anything changes.
   */
  applyWrites(writes: readonly PendingWrite[]): void {
    const staged = new Map<string, DocumentData | undefined>();
    const current = (path: string): DocumentData | undefined =>
      staged.has(path) ? staged.get(path) : this.documents.get(path);

    for (const write of writes) {
      const existing = current(write.path);
      switch (write.kind) {
        case 'create':
          if (existing) {
            throw new FakeFirestoreError(GRPC_ALREADY_EXISTS, `Document already exists: ${write.path}`);
          }
          staged.set(write.path, { ...write.data });
          break;
        case 'set':
          staged.set(write.path, write.merge && existing ? { ...existing, ...write.data } : { ...write.data });
          break;
        case 'update':
          if (!existing) {
            throw new FakeFirestoreError(GRPC_NOT_FOUND, `No document to update: ${write.path}`);
          }
          staged.set(write.path, { ...existing, ...write.data });
          break;
        case 'delete':
          staged.set(write.path, undefined);
          break;
      }
    }

    staged.forEach((data, path) => {
      if (data) {
        this.documents.set(path, data);
      } else {
        this.documents.delete(path);
      }
      this.bump(path);
    });
  }

  private isStale(tx: FakeTransaction): boolean {
    for (const [path, version] of tx.readVersions) {
      if (this.versionOf(path) !== version) {
        return true;
      }
    }
    return tx.queryReads.some(({ query, signature }) => this.querySignature(query) !== signature);
  }

  private bump(path: string): void {
    this.clock += 1;
    this.versions.set(path, this.clock);
  }
}
