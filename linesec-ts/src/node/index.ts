export { dialEndpoint, serveTcp, type ServeTcpOptions, type TcpSessionServer } from "./connect.js";
export { DuplexByteStream, socketStream } from "./duplexStream.js";
export { TcpStreamListener, connectTcp, listenTcp } from "./tcp.js";
