/**
 * CRM 테이블 TypeORM Entity (읽기 전용)
 * CRM 애플리케이션이 소유한 테이블이므로 컬럼명은 기존 스키마를 그대로 따릅니다.
 */
import { Entity, PrimaryColumn, Column } from 'typeorm';

@Entity({ name: 'companies', synchronize: false })
export class CompanyOrmEntity {
  @PrimaryColumn('varchar')
  id!: string;

  @Column({ type: 'varchar', nullable: true })
  name!: string | null;
}

@Entity({ name: 'leads', synchronize: false })
export class LeadOrmEntity {
  @PrimaryColumn('varchar')
  id!: string;

  @Column({ name: 'legal_name', type: 'varchar', nullable: true })
  legalName!: string | null;

  @Column({ name: 'qualified_company_id', type: 'varchar', nullable: true })
  companyId!: string | null;

  @Column({ name: 'deleted_at', type: 'timestamptz', nullable: true })
  deletedAt!: Date | null;
}

@Entity({ name: 'master_deals', synchronize: false })
export class DealOrmEntity {
  @PrimaryColumn('varchar')
  id!: string;

  @Column({ name: 'client_name', type: 'varchar', nullable: true })
  title!: string | null;

  @Column({ name: 'company_id', type: 'varchar', nullable: true })
  companyId!: string | null;
}
