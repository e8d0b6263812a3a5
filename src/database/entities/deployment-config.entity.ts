import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
} from 'typeorm';

/**
 * Per (user, repository) deployment settings: which branch auto-deploys,
 * which command runs, and the variables handed to it.
 */
@Entity('deployment_configs')
@Index(['user_id', 'repo_full_name'], { unique: true })
@Index(['repo_full_name', 'branch'])
export class DeploymentConfig {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ length: 255 })
  user_id!: string;

  /** GitHub numeric repository id, when the client knows it. */
  @Column({ type: 'bigint', nullable: true })
  repo_id!: string | null;

  @Column({ length: 255 })
  repo_full_name!: string;

  @Column({ length: 255, default: 'main' })
  branch!: string;

  @Column({ default: false })
  auto_deploy!: boolean;

  @Column({ type: 'text', default: './deploy.sh' })
  deploy_command!: string;

  @Column('jsonb', { default: () => `'{}'::jsonb` })
  environment_variables!: Record<string, string>;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;
}
