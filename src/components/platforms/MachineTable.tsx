import type { MachineHealth } from '@/types/machines'
import { STATUS_CONFIG } from './PlatformHealthGrid'

interface MachineTableProps {
  machines: MachineHealth[]
}

export function MachineTable({ machines }: MachineTableProps) {
  return (
    <div className="bg-white rounded-lg shadow-sm border border-gray-200">
      <div className="px-6 py-4 border-b border-gray-200">
        <h2 className="text-lg font-semibold text-gray-900">Machines</h2>
      </div>
      {machines.length === 0 ? (
        <div className="p-6 text-center text-gray-500">No machines reporting</div>
      ) : (
        <table className="min-w-full divide-y divide-gray-200">
          <thead className="bg-gray-50">
            <tr>
              <th className="px-6 py-3 text-left text-xs font-medium text-gray-500 uppercase tracking-wider">Machine</th>
              <th className="px-6 py-3 text-right text-xs font-medium text-gray-500 uppercase tracking-wider">Memory</th>
              <th className="px-6 py-3 text-right text-xs font-medium text-gray-500 uppercase tracking-wider">CPU</th>
              <th className="px-6 py-3 text-right text-xs font-medium text-gray-500 uppercase tracking-wider">Status</th>
            </tr>
          </thead>
          <tbody className="divide-y divide-gray-200">
            {machines.map((machine) => {
              const config = STATUS_CONFIG[machine.status]
              return (
                <tr key={machine.name}>
                  <td className="px-6 py-3 text-sm font-mono text-gray-900">{machine.name}</td>
                  <td className="px-6 py-3 text-sm text-right text-gray-700">{machine.memoryPercent.toFixed(1)}%</td>
                  <td className="px-6 py-3 text-sm text-right text-gray-700">{machine.cpuPercent.toFixed(1)}%</td>
                  <td className="px-6 py-3 text-right">
                    <span className={`px-2 py-0.5 text-xs font-medium rounded-full ${config.bg} ${config.color}`}>
                      {machine.status}
                    </span>
                  </td>
                </tr>
              )
            })}
          </tbody>
        </table>
      )}
    </div>
  )
}
