export * from './folder-mapping.repository';
export * from './folder-template.repository';
export * from './crm-record.repository';
