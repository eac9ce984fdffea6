// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';

// ── Migrations ──────────────────────────────────────────────
export { CreateUsers1760000000000 } from './migrations/1760000000000-CreateUsers';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
