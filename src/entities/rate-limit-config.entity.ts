import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn } from 'typeorm';
import { WindowLimitOverrides } from '../logic/rate-limit/types';

@Entity('rate_limit_config')
export class RateLimitConfig {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'int' })
  burstLimitPerMinute!: number;

  @Column({ type: 'int' })
  perConversationLimit!: number;

  @Column({ type: 'int' })
  perHourLimit!: number;

  @Column({ type: 'int' })
  perDayLimit!: number;

  // userId -> partial limits
  @Column('json')
  userOverrides!: Record<string, WindowLimitOverrides>;

  @Column('json')
  whitelistedUsers!: string[];

  @Column({ type: 'varchar', nullable: true })
  updatedBy!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
