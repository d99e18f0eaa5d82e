export { MachineTable } from './MachineTable'
export { PlatformHealthGrid, STATUS_CONFIG } from './PlatformHealthGrid'
