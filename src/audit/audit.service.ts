import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { AuditAction, AuditLog } from './entities/audit-log.entity';

export interface AuditLogEntry {
  action: AuditAction;
  userId: string;
  resourceId?: string;
  meta?: Record<string, unknown>;
}

@Injectable()
export class AuditService {
  private readonly logger = new Logger(AuditService.name);

  constructor(
    @InjectRepository(AuditLog)
    private readonly auditLogRepository: Repository<AuditLog>,
  ) {}

  /**
   * Pass the caller's transaction manager to make the entry part of the
   * same commit as the state change it records.
   */
  async log(entry: AuditLogEntry, manager?: EntityManager): Promise<AuditLog> {
    const repository = manager
      ? manager.getRepository(AuditLog)
      : this.auditLogRepository;

    const record = repository.create({
      action: entry.action,
      userId: entry.userId,
      resourceId: entry.resourceId ?? null,
      metadata: entry.meta ?? null,
    });

    const saved = await repository.save(record);

    this.logger.log(
      `[AUDIT] action=${saved.action} userId=${saved.userId} resourceId=${saved.resourceId ?? 'n/a'}`,
    );

    return saved;
  }

  findForResource(resourceId: string): Promise<AuditLog[]> {
    return this.auditLogRepository.find({
      where: { resourceId },
      order: { createdAt: 'ASC' },
    });
  }
}
