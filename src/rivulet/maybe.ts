const enum MaybeType {
  Some = 'Some',
  None = 'None',
}
interface Some<T> {
  readonly $m_type: MaybeType.Some;
  readonly $m_value: T;
}
function Some<T>(value: T): Some<T> {
  return {
    $m_type: MaybeType.Some,
    $m_value: value,
  };
}
function isSome<T>(maybe: Maybe<T>): maybe is Some<T> {
  return maybe.$m_type === MaybeType.Some;
}
interface None {
  readonly $m_type: MaybeType.None;
}
const None: None = {
  $m_type: MaybeType.None,
};
function isNone<T>(maybe: Maybe<T>): maybe is None {
  return maybe.$m_type === MaybeType.None;
}
type Maybe<T> = Some<T> | None;
function getOrUndefined<T>(maybe: Maybe<T>): T | undefined {
  return isSome(maybe) ? maybe.$m_value : undefined;
}
export { MaybeType, Some, isSome, None, isNone, type Maybe, getOrUndefined };
