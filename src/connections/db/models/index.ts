export * from './user.model';
export * from './category.model';
export * from './product.model';
export * from './order.model';
export * from './consultation.model';
export * from './tip.model';
export * from './success-story.model';
export * from './community-message.model';
