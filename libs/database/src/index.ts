// ── Entities ────────────────────────────────────────────────
export { User } from './entities/user.entity';

// ── Module ──────────────────────────────────────────────────
export { DatabaseModule } from './database.module';
