import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';
import { LimitKind } from '../logic/rate-limit/types';

@Entity('rate_limit_violations')
export class RateLimitViolation {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column()
  userId!: string;

  @Column({ type: 'varchar', nullable: true })
  conversationId!: string | null;

  @Column({ type: 'varchar', length: 32 })
  kind!: LimitKind;

  @Column({ type: 'int' })
  limitValue!: number;

  @Column({ type: 'int' })
  used!: number;

  @Column({ default: 'blocked' })
  actionTaken!: string;

  @Column({ type: 'text', nullable: true })
  userMessage!: string | null;

  @Column({ type: 'varchar', nullable: true })
  clientAddress!: string | null;

  @Column({ type: 'varchar', nullable: true })
  userAgent!: string | null;

  @CreateDateColumn({ precision: 3 })
  violatedAt!: Date;
}
