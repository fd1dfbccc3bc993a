import { v4 as uuidv4 } from "uuid";
import { JobNotFoundError } from "./errors.js";
import { applyTransition } from "./jobStateMachine.js";
import type { JobStore } from "./jobStore.js";
import type { PrincipalIdentity, PrincipalStore } from "./principals.js";
import type {
  CompressionJob,
  JobId,
  JobListQuery,
  JobPage,
  JobStatus,
  NewJobInput,
  Principal,
  PrincipalId,
  TransitionPatch,
} from "./types.js";

interface Tables {
  principals: Map<PrincipalId, Principal>;
  jobs: Map<JobId, CompressionJob>;
}

/**
 * Serialises async sections. Each `run` starts only after every earlier
 * one has settled.
 */
class Mutex {
  private tail: Promise<void> = Promise.resolve();

  run<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}

/**
 * In-process database used when DATABASE_URL is unset and in tests.
 *
 * Transactions are serialisable: they run one at a time against a draft
 * copy of the tables, and the draft replaces the live tables only when the
 * callback returns normally. Records are immutable values, so a shallow copy
 * of each map is a full snapshot.
 */
export class MemoryDatabase {
  private tables: Tables = { principals: new Map(), jobs: new Map() };
  private readonly mutex = new Mutex();

  constructor(readonly now: () => Date = () => new Date()) {}

  transaction<T>(fn: (draft: Tables) => Promise<T> | T): Promise<T> {
    return this.mutex.run(async () => {
      const draft: Tables = {
        principals: new Map(this.tables.principals),
        jobs: new Map(this.tables.jobs),
      };
      const result = await fn(draft);
      this.tables = draft;
      return result;
    });
  }

  read<T>(fn: (tables: Tables) => T): T {
    return fn(this.tables);
  }

  /** Remove a principal and, like the FK cascade, all of its jobs. */
  deletePrincipal(id: PrincipalId): Promise<void> {
    return this.transaction((draft) => {
      draft.principals.delete(id);
      for (const [jobId, job] of draft.jobs) {
        if (job.principalId === id) draft.jobs.delete(jobId);
      }
    });
  }

  /** Flip a principal's active flag (an administrative action). */
  setPrincipalActive(id: PrincipalId, isActive: boolean): Promise<void> {
    return this.transaction((draft) => {
      const current = draft.principals.get(id);
      if (current) {
        draft.principals.set(id, { ...current, isActive, updatedAt: this.now().toISOString() });
      }
    });
  }
}

export class MemoryJobStore implements JobStore {
  constructor(private readonly db: MemoryDatabase) {}

  create(input: NewJobInput): Promise<CompressionJob> {
    return this.db.transaction((draft) => {
      if (!draft.principals.has(input.principalId)) {
        throw new Error(`principal ${input.principalId} does not exist`);
      }
      const stamp = this.db.now().toISOString();
      const job: CompressionJob = {
        id: uuidv4(),
        principalId: input.principalId,
        originalFilename: input.filename,
        originalSizeBytes: input.sizeBytes,
        profile: input.profile,
        preserveImages: input.preserveImages,
        status: "queued",
        compressedSizeBytes: null,
        errorCode: null,
        errorMessage: null,
        createdAt: stamp,
        updatedAt: stamp,
        completedAt: null,
      };
      draft.jobs.set(job.id, job);
      return { ...job };
    });
  }

  transition(jobId: JobId, to: JobStatus, patch: TransitionPatch = {}): Promise<CompressionJob> {
    return this.db.transaction((draft) => {
      const current = draft.jobs.get(jobId);
      if (!current) throw new JobNotFoundError(jobId);
      const next = applyTransition(current, to, patch, this.db.now());
      draft.jobs.set(jobId, next);
      return { ...next };
    });
  }

  claim(jobId: JobId): Promise<CompressionJob | null> {
    return this.db.transaction((draft) => {
      const current = draft.jobs.get(jobId);
      if (!current) throw new JobNotFoundError(jobId);
      if (current.status !== "queued") return null;
      const next = applyTransition(current, "running", {}, this.db.now());
      draft.jobs.set(jobId, next);
      return { ...next };
    });
  }

  async get(jobId: JobId): Promise<CompressionJob> {
    const job = this.db.read((tables) => tables.jobs.get(jobId));
    if (!job) throw new JobNotFoundError(jobId);
    return { ...job };
  }

  async list(query: JobListQuery): Promise<JobPage> {
    return this.db.read((tables) => {
      // Map iteration is insertion order; newest first means reversed.
      const matching = [...tables.jobs.values()]
        .filter((job) => query.principalId === undefined || job.principalId === query.principalId)
        .reverse();
      return {
        items: matching.slice(query.offset, query.offset + query.limit).map((job) => ({ ...job })),
        total: matching.length,
      };
    });
  }

  async findStale(status: JobStatus, olderThan: Date): Promise<CompressionJob[]> {
    const cutoff = olderThan.getTime();
    return this.db.read((tables) =>
      [...tables.jobs.values()]
        .filter((job) => job.status === status && Date.parse(job.updatedAt) < cutoff)
        .map((job) => ({ ...job }))
    );
  }
}

export class MemoryPrincipalStore implements PrincipalStore {
  constructor(private readonly db: MemoryDatabase) {}

  upsertByEmail(identity: PrincipalIdentity): Promise<Principal> {
    const email = identity.email.toLowerCase();
    return this.db.transaction((draft) => {
      for (const principal of draft.principals.values()) {
        if (principal.email === email) return { ...principal };
      }
      const stamp = this.db.now().toISOString();
      const created: Principal = {
        id: uuidv4(),
        email,
        fullName: identity.fullName,
        isActive: true,
        createdAt: stamp,
        updatedAt: stamp,
      };
      draft.principals.set(created.id, created);
      return { ...created };
    });
  }

  /** Number of principal rows; lets tests assert no duplicates were made. */
  count(): number {
    return this.db.read((tables) => tables.principals.size);
  }
}
