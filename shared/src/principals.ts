import { v4 as uuidv4 } from "uuid";
import { queryOnce, type SqlPool } from "./db/index.js";
import type { Principal } from "./types.js";

export interface PrincipalIdentity {
  email: string;
  fullName: string;
}

export interface PrincipalStore {
  /**
   * Return the principal owning `email`, creating it on first use. Safe
   * under concurrent first uses of the same address.
   */
  upsertByEmail(identity: PrincipalIdentity): Promise<Principal>;
}

type UserRow = {
  id: string;
  email: string;
  full_name: string;
  is_active: boolean;
  created_at: Date | string;
  updated_at: Date | string;
};

function rowToPrincipal(row: UserRow): Principal {
  return {
    id: row.id,
    email: row.email,
    fullName: row.full_name,
    isActive: row.is_active,
    createdAt: new Date(row.created_at).toISOString(),
    updatedAt: new Date(row.updated_at).toISOString(),
  };
}

const USER_COLUMNS = "id, email, full_name, is_active, created_at, updated_at";

export class PgPrincipalStore implements PrincipalStore {
  constructor(private readonly pool: SqlPool) {}

  async upsertByEmail(identity: PrincipalIdentity): Promise<Principal> {
    // DO UPDATE (not DO NOTHING) so RETURNING yields the existing row too.
    const res = await queryOnce<UserRow>(
      this.pool,
      `INSERT INTO users (id, email, full_name)
       VALUES ($1, $2, $3)
       ON CONFLICT (email) DO UPDATE SET email = EXCLUDED.email
       RETURNING ${USER_COLUMNS}`,
      [uuidv4(), identity.email.toLowerCase(), identity.fullName]
    );
    return rowToPrincipal(res.rows[0]);
  }
}
