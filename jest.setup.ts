// Jest runs each test file in its own VM realm, while Node's AbortController
// creates its abort reasons (DOMException) in the host realm. Link the host
// DOMException to this realm's Error so `instanceof Error` holds as it does
// outside Jest.
Object.setPrototypeOf(DOMException.prototype, Error.prototype);
