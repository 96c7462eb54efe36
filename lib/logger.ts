import createDebug from "debug"

// Enable with DEBUG=bundle-router:*
export const solverLog = createDebug("bundle-router:solver")
export const assemblerLog = createDebug("bundle-router:assembler")
