import { CompanyRecord, DealRecord, LeadRecord, type ICrmRecordRepository } from '../../domain/crm';

/**
 * 테스트용 CRM 기록 리포지토리
 */
export class InMemoryCrmRecordRepository implements ICrmRecordRepository {
  readonly companies = new Map<string, CompanyRecord>();
  readonly leads = new Map<string, LeadRecord>();
  readonly deals = new Map<string, DealRecord>();

  addCompany(id: string, name: string | null): this {
    this.companies.set(id, new CompanyRecord(id, name));
    return this;
  }

  addLead(id: string, legalName: string | null, companyId: string | null, deletedAt: Date | null = null): this {
    this.leads.set(id, new LeadRecord(id, legalName, companyId, deletedAt));
    return this;
  }

  addDeal(id: string, title: string | null, companyId: string | null): this {
    this.deals.set(id, new DealRecord(id, title, companyId));
    return this;
  }

  async findCompanyById(id: string): Promise<CompanyRecord | null> {
    return this.companies.get(id) ?? null;
  }

  async findLeadById(id: string): Promise<LeadRecord | null> {
    return this.leads.get(id) ?? null;
  }

  async findDealById(id: string): Promise<DealRecord | null> {
    return this.deals.get(id) ?? null;
  }
}
