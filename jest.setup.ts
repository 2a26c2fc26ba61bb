// Tell React that act() is available so state updates inside it are flushed without warnings.
Reflect.set(globalThis, "IS_REACT_ACT_ENVIRONMENT", true)
