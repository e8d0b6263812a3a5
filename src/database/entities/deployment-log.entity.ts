import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  ManyToOne,
  JoinColumn,
  Index,
} from 'typeorm';
import { Deployment } from './deployment.entity';

/** One timestamped log line; order within a deployment is the serial id. */
@Entity('deployment_logs')
@Index(['deployment_id', 'id'])
export class DeploymentLog {
  @PrimaryGeneratedColumn({ type: 'bigint' })
  id!: string;

  @Column({ type: 'uuid' })
  deployment_id!: string;

  @ManyToOne(() => Deployment, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'deployment_id' })
  deployment?: Deployment;

  @Column('text')
  line!: string;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;
}
