export {
  DEFAULT_STORAGE_KEY,
  RestorationStorageKind,
  areRestorationAssertionsEnabled,
  getRestorationConfig,
  type RestorationConfig,
} from "./config/restoration-config"

export { ChangeNotifier, type Listenable, type VoidCallback } from "./restoration/change-notifier"
export { RestorationError, restorationAssert } from "./restoration/errors"
export { RestorationBucket, type RestorationBucketManager } from "./restoration/restoration-bucket"
export {
  RESTORATION_DATA_VERSION,
  decodeRestorationData,
  encodeRestorationData,
  isSerializableForRestoration,
  primitivesEqual,
  type DecodeResult,
  type RawBucketData,
  type RestorationPrimitive,
} from "./restoration/restoration-codec"
export {
  RestorationManager,
  getDefaultRestorationManager,
  type FrameScheduler,
  type RestorationManagerOptions,
  type RestorationUpdate,
} from "./restoration/restoration-manager"
export {
  MemoryRestorationStore,
  WebStorageRestorationStore,
  createRestorationStore,
  type RestorationStore,
  type StorageArea,
} from "./restoration/restoration-store"
export {
  RestorationManagerProvider,
  RestorationScope,
  RootRestorationScope,
  UnmanagedRestorationScope,
  useRestorationManager,
  useRestorationScope,
} from "./restoration/restoration-scope"
export {
  EMPTY_TEXT_EDITING_VALUE,
  TextEditingController,
  type TextEditingValue,
  type TextSelection,
} from "./restoration/text-editing-controller"

export { RestorableProperty, RestorableValue, type RestorablePropertyOwner } from "./hooks/restorable-property"
export {
  RestorableBool,
  RestorableChangeNotifier,
  RestorableDate,
  RestorableDouble,
  RestorableEnum,
  RestorableInt,
  RestorableListenable,
  RestorableNullableBool,
  RestorableNullableDate,
  RestorableNullableDouble,
  RestorableNullableEnum,
  RestorableNullableInt,
  RestorableNullableNumber,
  RestorableNullableString,
  RestorableNumber,
  RestorablePrimitiveValue,
  RestorableString,
  RestorableTextEditingController,
  type RestorableEnumOptions,
} from "./hooks/restorable-properties"
export { useRestorableProperty } from "./hooks/use-restorable-property"
export {
  StateRestorationController,
  useStateRestoration,
  type RestoreStateCallback,
  type StateRestoration,
  type UseStateRestorationOptions,
} from "./hooks/use-state-restoration"
export { useTextInputBinding, type TextInputBinding } from "./hooks/use-text-input-binding"
export { setDebugLogSink, type DebugLogEntry, type DebugLogSink } from "./utils/debug-logger"
