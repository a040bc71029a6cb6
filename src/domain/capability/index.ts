export {
  Capability,
  createCapability,
  isCapabilityKey,
  capabilityName,
} from './Capability';

export type {
  Constructor,
  AbstractConstructor,
  CapabilityKey,
  InstanceOf,
  InstancesOf,
} from './Capability';
