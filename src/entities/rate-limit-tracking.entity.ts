import { Entity, PrimaryGeneratedColumn, Column, UpdateDateColumn, Index } from 'typeorm';

@Entity('rate_limit_tracking')
export class RateLimitTracking {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index({ unique: true })
  @Column()
  userId!: string;

  @Column({ type: 'int', default: 0 })
  minuteCount!: number;

  @Column({ type: 'datetime', precision: 3 })
  minuteWindowStart!: Date;

  @Column({ type: 'int', default: 0 })
  hourCount!: number;

  @Column({ type: 'datetime', precision: 3 })
  hourWindowStart!: Date;

  @Column({ type: 'int', default: 0 })
  dayCount!: number;

  @Column({ type: 'datetime', precision: 3 })
  dayWindowStart!: Date;

  @Column({ type: 'datetime', precision: 3, nullable: true })
  lastPromptAt!: Date | null;

  @UpdateDateColumn()
  updatedAt!: Date;
}
