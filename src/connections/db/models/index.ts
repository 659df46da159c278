export * from './user.model';
export * from './driver.model';
export * from './product.model';
export * from './warehouse.model';
export * from './customer.model';
export * from './shipment.model';
export * from './status-update.model';
