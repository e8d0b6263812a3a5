import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import { DeploymentStatus } from '../../deployment/deployment-status';
import { DeploymentConfig } from './deployment-config.entity';

/**
 * One attempt to deploy a repository commit.
 * Status and timestamps only change through DeploymentStateService; log lines live in deployment_logs.
 */
@Entity('deployments')
@Index(['user_id', 'created_at'])
@Index(['repo_full_name', 'created_at'])
export class Deployment {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  user_id!: string;

  @Column({ type: 'uuid', nullable: true })
  config_id!: string | null;

  @ManyToOne(() => DeploymentConfig, { onDelete: 'SET NULL', nullable: true })
  @JoinColumn({ name: 'config_id' })
  config?: DeploymentConfig | null;

  @Column({ length: 255 })
  repo_full_name!: string;

  @Column({ length: 100 })
  commit_sha!: string;

  @Column({ length: 255 })
  branch!: string;

  @Column({ type: 'varchar', length: 50, default: DeploymentStatus.Pending })
  status!: DeploymentStatus;

  /** Set by the application clock so it compares with started_at/completed_at. */
  @Column({ type: 'timestamptz' })
  created_at!: Date;

  @Column({ type: 'timestamptz', nullable: true })
  started_at!: Date | null;

  @Column({ type: 'timestamptz', nullable: true })
  completed_at!: Date | null;

  /** Username of the caller, or "webhook". */
  @Column({ type: 'varchar', length: 255, nullable: true })
  triggered_by!: string | null;

  @Column({ default: false })
  manual_trigger!: boolean;

  @Column({ type: 'text', nullable: true })
  error_message!: string | null;
}
