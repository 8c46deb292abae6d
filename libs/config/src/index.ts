export * from './pipeline-config.module';
export * from './pipeline-config.service';
export * from './pipeline-config.types';
export * from './pipeline-env.schema';
