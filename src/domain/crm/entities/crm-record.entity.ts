/**
 * CRM 기록(회사/리드/딜) 도메인 엔티티
 * 폴더 계층은 이 기록들을 읽기만 하며 수정하지 않습니다.
 */

export class CompanyRecord {
  constructor(
    readonly id: string,
    readonly name: string | null,
  ) {}

  /**
   * 회사 폴더명 (이름이 비어 있으면 "Company {id}")
   */
  folderName(): string {
    const name = this.name?.trim();
    return name ? name : `Company ${this.id}`;
  }
}

export class LeadRecord {
  constructor(
    readonly id: string,
    readonly legalName: string | null,
    readonly companyId: string | null,
    readonly deletedAt: Date | null = null,
  ) {}

  isDeleted(): boolean {
    return this.deletedAt !== null;
  }

  folderName(): string {
    return `Lead - ${this.legalName?.trim() || 'Unknown'}`;
  }
}

export class DealRecord {
  constructor(
    readonly id: string,
    readonly title: string | null,
    readonly companyId: string | null,
  ) {}

  folderName(): string {
    return `Deal - ${this.title?.trim() || 'Unknown'}`;
  }
}
