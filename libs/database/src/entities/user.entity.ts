import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

/**
 * User entity — the single account record behind both the HTTP account
 * endpoints and the gRPC lookup service.
 *
 * Invariants:
 * - Email is unique across all users, active or not, and stored lower-cased
 * - Password is stored as a bcrypt hash, never in plaintext
 * - Users are never physically deleted; deactivation flips isActive
 */
@Entity('users')
export class User {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index('IDX_users_email', { unique: true })
  @Column({ type: 'varchar', length: 255, unique: true })
  email!: string;

  @Column({ type: 'varchar', length: 150, default: '' })
  username!: string;

  @Column({ type: 'varchar', length: 150, name: 'first_name', default: '' })
  firstName!: string;

  @Column({ type: 'varchar', length: 150, name: 'last_name', default: '' })
  lastName!: string;

  @Column({ type: 'varchar', length: 20, name: 'phone_number', default: '' })
  phoneNumber!: string;

  @Column({ type: 'varchar', length: 255, name: 'password_hash' })
  passwordHash!: string;

  @Column({ type: 'boolean', name: 'is_active', default: true })
  isActive!: boolean;

  /** Grants the staff-only listing and lookup endpoints */
  @Column({ type: 'boolean', name: 'is_staff', default: false })
  isStaff!: boolean;

  /** Stored and reported only; no flow gates on it */
  @Column({ type: 'boolean', name: 'is_verified', default: false })
  isVerified!: boolean;

  @Index('IDX_users_created_at')
  @CreateDateColumn({ type: 'timestamptz', name: 'created_at' })
  createdAt!: Date;

  @UpdateDateColumn({ type: 'timestamptz', name: 'updated_at' })
  updatedAt!: Date;

  @Column({ type: 'timestamptz', name: 'last_login_at', nullable: true })
  lastLoginAt!: Date | null;
}
