// Runtime support for generated qselect modules. Schema-independent; generated
// code imports this module as a namespace.

export { createClient, graphqlRequestTransport } from "./client";
export { createRequest, printRequest } from "./request";
export {
  ResponseShapeError,
  decodeResponse,
  isResponseOf,
  selectionSchema,
} from "./response";
export { SelectionBuilder, SelectionError, selectionOf } from "./selection";
export { list, named } from "./shape";
export { leaf, leaves, objectField, scalarField } from "./tokens";

export type {
  Client,
  ClientOptions,
  GraphQLRequestTransportOptions,
  Operation,
  Transport,
} from "./client";
export type { QueryRequest } from "./request";
export type {
  EmptySelection,
  Extend,
  ObjectSelectionNode,
  ResponseOf,
  ScalarSelectionNode,
  SelectionNode,
} from "./selection";
export type { ListShape, NamedShape, Shape, Shaped } from "./shape";
export type {
  FieldToken,
  Leaf,
  ObjectFieldToken,
  ScalarFieldToken,
} from "./tokens";
