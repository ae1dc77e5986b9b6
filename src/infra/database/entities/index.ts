export * from './folder-mapping.orm-entity';
export * from './folder-template.orm-entity';
export * from './crm-record.orm-entity';
