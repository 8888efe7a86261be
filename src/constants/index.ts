export * from './user.constants';
export * from './order.constants';
export * from './consultation.constants';
export * from './community.constants';
