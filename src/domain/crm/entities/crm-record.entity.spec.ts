import { CompanyRecord, DealRecord, LeadRecord } from './crm-record.entity';

describe('CRM 기록 폴더명', () => {
  it('회사 이름이 있으면 앞뒤 공백을 제거한 이름을 사용해야 한다', () => {
    expect(new CompanyRecord('C1', '  Acme Ltda ').folderName()).toBe('Acme Ltda');
  });

  it('회사 이름이 비어 있으면 "Company {id}"를 사용해야 한다', () => {
    expect(new CompanyRecord('C1', '   ').folderName()).toBe('Company C1');
    expect(new CompanyRecord('C2', null).folderName()).toBe('Company C2');
  });

  it('리드와 딜은 접두사를 붙이고, 이름이 없으면 Unknown을 사용해야 한다', () => {
    expect(new LeadRecord('L1', 'Terreno Norte', 'C1').folderName()).toBe('Lead - Terreno Norte');
    expect(new DealRecord('D1', null, 'C1').folderName()).toBe('Deal - Unknown');
  });

  it('deletedAt이 있는 리드는 삭제된 것으로 판단해야 한다', () => {
    expect(new LeadRecord('L1', 'x', null, new Date()).isDeleted()).toBe(true);
    expect(new LeadRecord('L2', 'x', null).isDeleted()).toBe(false);
  });
});
