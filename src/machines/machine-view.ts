import type { Machine } from './machine.entity';
import { formatRange } from './slot-template';

export function toMachineView(machine: Machine) {
  return {
    id: machine.id,
    name: machine.name,
    code: machine.code,
    status: machine.status,
    building: machine.building ? { id: machine.building.id, name: machine.building.name } : null,
    slotCount: machine.slotCount,
    slots: machine.slotTemplate.map((range, index) => ({
      slotNumber: index + 1,
      timeRange: { start: range.start, end: range.end },
      label: formatRange(range),
    })),
    createdAt: machine.createdAt.toISOString(),
    updatedAt: machine.updatedAt.toISOString(),
  };
}
