import {
  BarChart,
  Bar,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  Legend,
  ResponsiveContainer,
} from 'recharts';
import type { StationSummary } from '../../catalog/schema/CatalogV1';

interface Props {
  stations: StationSummary[];
}

export default function StationSurfaceChart({ stations }: Props) {
  const data = stations.map(s => ({
    station: s.station,
    Boilers: s.boilers,
    Surfaces: s.surfaces,
  }));

  return (
    <ResponsiveContainer width="100%" height="100%">
      <BarChart data={data} margin={{ top: 5, right: 20, left: 0, bottom: 5 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis dataKey="station" tick={{ fontSize: 10 }} interval={0} />
        <YAxis allowDecimals={false} tick={{ fontSize: 10 }} />
        <Tooltip contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }} />
        <Legend wrapperStyle={{ fontSize: '0.8rem', paddingTop: '8px' }} />
        <Bar dataKey="Boilers" fill="#ed8936" radius={[4, 4, 0, 0]} />
        <Bar dataKey="Surfaces" fill="#3182ce" radius={[4, 4, 0, 0]} />
      </BarChart>
    </ResponsiveContainer>
  );
}
