export {
  ServiceLocator,
  ServiceKey,
  createServiceKey,
  type ServiceFactory,
  type ServiceEntry,
} from './service-locator';
export { ServiceKeys } from './keys';
export * from './errors';
