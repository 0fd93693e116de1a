export { AuditSink, CompositeAuditSink, EventBusAuditSink, MemoryAuditSink } from "./auditSink";
export { FileAuditSink } from "./fileAuditSink";
