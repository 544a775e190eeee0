export {
  createAppConfig,
  PlaceholderPolicySchema,
  DuplicatePolicySchema,
  type AppConfig,
  type StackConfig,
  type ConfigOverrides,
  type PlaceholderPolicy,
  type DuplicatePolicy,
} from './app-config';
