/**
 * CRM Record Repository 구현체 (읽기 전용)
 */
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { CompanyOrmEntity, DealOrmEntity, LeadOrmEntity } from '../entities/crm-record.orm-entity';
import type { ICrmRecordRepository } from '../../../domain/crm/repositories/crm-record.repository.interface';
import { CompanyRecord, DealRecord, LeadRecord } from '../../../domain/crm/entities/crm-record.entity';

@Injectable()
export class CrmRecordRepository implements ICrmRecordRepository {
  constructor(
    @InjectRepository(CompanyOrmEntity)
    private readonly companyRepository: Repository<CompanyOrmEntity>,
    @InjectRepository(LeadOrmEntity)
    private readonly leadRepository: Repository<LeadOrmEntity>,
    @InjectRepository(DealOrmEntity)
    private readonly dealRepository: Repository<DealOrmEntity>,
  ) {}

  async findCompanyById(id: string): Promise<CompanyRecord | null> {
    const orm = await this.companyRepository.findOne({ where: { id } });
    return orm ? new CompanyRecord(orm.id, orm.name) : null;
  }

  async findLeadById(id: string): Promise<LeadRecord | null> {
    const orm = await this.leadRepository.findOne({ where: { id } });
    return orm ? new LeadRecord(orm.id, orm.legalName, orm.companyId, orm.deletedAt) : null;
  }

  async findDealById(id: string): Promise<DealRecord | null> {
    const orm = await this.dealRepository.findOne({ where: { id } });
    return orm ? new DealRecord(orm.id, orm.title, orm.companyId) : null;
  }
}
