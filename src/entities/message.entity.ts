import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Conversation } from './conversation.entity';
import { Artifact } from '../logic/tools/types';

@Entity('messages')
export class Message {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Index()
  @Column()
  conversationId!: string;

  @Column({ type: 'varchar', length: 16 })
  role!: 'user' | 'assistant';

  @Column('text')
  content!: string;

  @Column({ type: 'varchar', nullable: true })
  turnId!: string | null;

  @Column({ type: 'int', nullable: true })
  tokensUsed!: number | null;

  @Column({ type: 'int', nullable: true })
  processingTimeMs!: number | null;

  @Column({ type: 'int', nullable: true })
  iterations!: number | null;

  @Column({ type: 'varchar', length: 16, nullable: true })
  outcome!: 'complete' | 'limit_reached' | null;

  @Column('json', { nullable: true })
  toolsUsed!: string[] | null;

  @Column('json', { nullable: true })
  artifacts!: Artifact[] | null;

  @CreateDateColumn({ precision: 3 })
  ts!: Date;

  @ManyToOne(() => Conversation, conversation => conversation.messages, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'conversationId' })
  conversation!: Conversation;
}
