export * from './csv.util';
export * from './datastore.module';
export * from './output-writer.service';
export * from './product-catalog.repository';
export * from './record-file.util';
export * from './review-source.repository';
export * from './serializers';
