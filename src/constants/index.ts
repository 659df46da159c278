export * from './shipment.constants';
export * from './user.constants';
