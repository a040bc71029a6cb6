export {
  defineComponent,
  describeClass,
  assertComponentDescriptor,
  describeComponent,
} from './ComponentDescriptor';

export type {
  ComponentFactory,
  ComponentDescriptor,
  ComponentDefinition,
} from './ComponentDescriptor';
