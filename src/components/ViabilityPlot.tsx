import { IC50_TARGET_PERCENT, type ViabilityPoint } from '../lib/ic50Pipeline'
import { formatIc50 } from '../lib/viabilityExport'

type Props = {
  curve: readonly ViabilityPoint[]
  ic50: number | null
  unit: string
  title?: string
  xScale?: 'linear' | 'log10'
}

const clamp = (v: number, lo: number, hi: number) => Math.min(hi, Math.max(lo, v))

const finite = (values: number[]) => values.filter((v) => Number.isFinite(v))

export function ViabilityPlot({ curve, ic50, unit, title, xScale = 'linear' }: Props) {
  const width = 560
  const height = 340
  const pad = 48

  const points = curve.filter((p) => Number.isFinite(p.concentration) && Number.isFinite(p.meanViabilityPercent))
  const ic50Shown = ic50 !== null && Number.isFinite(ic50) ? ic50 : null

  const xTransform = (x: number) => {
    if (xScale !== 'log10') return x
    return Math.log10(Math.max(1e-12, x))
  }

  const xsT = finite([...points.map((p) => xTransform(p.concentration)), ...(ic50Shown === null ? [] : [xTransform(ic50Shown)])])
  const ys = finite([
    ...points.map((p) => p.meanViabilityPercent + (Number.isFinite(p.stdDevViabilityPercent) ? p.stdDevViabilityPercent : 0)),
    ...points.map((p) => p.meanViabilityPercent - (Number.isFinite(p.stdDevViabilityPercent) ? p.stdDevViabilityPercent : 0)),
    IC50_TARGET_PERCENT,
  ])

  const xMinT = xsT.length ? Math.min(...xsT) : 0
  const xMaxT = xsT.length ? Math.max(...xsT) : 1
  const yMin = Math.min(0, ...ys)
  const yMax = Math.max(100, ...ys)

  const xSpan = xMaxT - xMinT || 1
  const ySpan = yMax - yMin || 1

  const x0T = xMinT - xSpan * 0.08
  const x1T = xMaxT + xSpan * 0.08
  const y0 = yMin - ySpan * 0.06
  const y1 = yMax + ySpan * 0.06

  const xToPxFromXT = (xT: number) => pad + ((xT - x0T) / (x1T - x0T)) * (width - pad * 2)
  const xToPx = (x: number) => xToPxFromXT(xTransform(x))
  const yScale = (y: number) => height - pad - ((y - y0) / (y1 - y0)) * (height - pad * 2)

  const linePath = points
    .map((p, i) => `${i === 0 ? 'M' : 'L'} ${xToPx(p.concentration).toFixed(2)} ${yScale(p.meanViabilityPercent).toFixed(2)}`)
    .join(' ')

  const ticks = (min: number, max: number, n: number) => {
    const out: number[] = []
    for (let i = 0; i <= n; i += 1) out.push(min + (i / n) * (max - min))
    return out
  }

  const xTicksT = ticks(x0T, x1T, 4)
  const yTicks = ticks(y0, y1, 4)

  const formatXT = (xT: number) => {
    if (xScale !== 'log10') return clamp(xT, -1e9, 1e9).toFixed(1)
    const conc = 10 ** xT
    if (!Number.isFinite(conc)) return ''
    if (conc >= 10) return conc.toFixed(0)
    if (conc >= 1) return conc.toFixed(1)
    if (conc >= 0.1) return conc.toFixed(2)
    return conc.toExponential(1)
  }

  const unitLabel = unit.trim() ? ` (${unit.trim()})` : ''

  return (
    <svg
      viewBox={`0 0 ${width} ${height}`}
      width="100%"
      height="auto"
      role="img"
      aria-label={title ?? 'Viability plot'}
      style={{ display: 'block' }}
    >
      <rect x="0" y="0" width={width} height={height} fill="#FFFDF6" stroke="#111113" strokeWidth="2" />

      {title ? (
        <text x={pad} y={24} fontSize="13" fontFamily="var(--font-mono)" fill="#2F2F36">
          {title}
        </text>
      ) : null}

      {/* grid */}
      {xTicksT.map((t) => (
        <line key={`x-${t}`} x1={xToPxFromXT(t)} x2={xToPxFromXT(t)} y1={pad} y2={height - pad} stroke="rgba(17,17,20,0.08)" />
      ))}
      {yTicks.map((t) => (
        <line key={`y-${t}`} x1={pad} x2={width - pad} y1={yScale(t)} y2={yScale(t)} stroke="rgba(17,17,20,0.08)" />
      ))}

      {/* axes */}
      <line x1={pad} x2={width - pad} y1={height - pad} y2={height - pad} stroke="#111113" strokeWidth="2" />
      <line x1={pad} x2={pad} y1={pad} y2={height - pad} stroke="#111113" strokeWidth="2" />

      {/* 50% and IC50 reference lines */}
      <line
        data-testid="ic50-hline"
        x1={pad}
        x2={width - pad}
        y1={yScale(IC50_TARGET_PERCENT)}
        y2={yScale(IC50_TARGET_PERCENT)}
        stroke="#D62728"
        strokeDasharray="6 4"
        strokeWidth="1.5"
      />
      {ic50Shown !== null ? (
        <>
          <line
            data-testid="ic50-vline"
            x1={xToPx(ic50Shown)}
            x2={xToPx(ic50Shown)}
            y1={pad}
            y2={height - pad}
            stroke="#D62728"
            strokeDasharray="6 4"
            strokeWidth="1.5"
          />
          <text
            x={xToPx(ic50Shown) + 6}
            y={yScale(30)}
            fontSize="12"
            fontFamily="var(--font-mono)"
            fill="#D62728"
            data-testid="ic50-label"
          >
            {`IC50 ≈ ${formatIc50(ic50Shown, unit)}`}
          </text>
        </>
      ) : null}

      {points.length ? <path d={linePath} fill="none" stroke="#1B2A6B" strokeWidth="2" /> : null}

      {/* error bars (±SD) */}
      {points.map((p, idx) => {
        if (!Number.isFinite(p.stdDevViabilityPercent)) return null
        const cx = xToPx(p.concentration)
        const top = yScale(p.meanViabilityPercent + p.stdDevViabilityPercent)
        const bottom = yScale(p.meanViabilityPercent - p.stdDevViabilityPercent)
        return (
          <g key={`err-${idx}`} stroke="#1B2A6B" strokeWidth="1.5" data-testid="error-bar">
            <line x1={cx} x2={cx} y1={top} y2={bottom} />
            <line x1={cx - 5} x2={cx + 5} y1={top} y2={top} />
            <line x1={cx - 5} x2={cx + 5} y1={bottom} y2={bottom} />
          </g>
        )
      })}

      {points.map((p, idx) => (
        <circle
          key={idx}
          cx={xToPx(p.concentration)}
          cy={yScale(p.meanViabilityPercent)}
          r={5}
          fill="#1B2A6B"
          stroke="#111113"
          strokeWidth="1.5"
          data-testid="viability-point"
        />
      ))}

      {/* tick labels */}
      {xTicksT.map((t) => (
        <text
          key={`xl-${t}`}
          x={xToPxFromXT(t)}
          y={height - pad + 20}
          textAnchor="middle"
          fontSize="11"
          fontFamily="var(--font-mono)"
          fill="#2F2F36"
        >
          {formatXT(t)}
        </text>
      ))}
      {yTicks.map((t) => (
        <text
          key={`yl-${t}`}
          x={pad - 10}
          y={yScale(t) + 4}
          textAnchor="end"
          fontSize="11"
          fontFamily="var(--font-mono)"
          fill="#2F2F36"
        >
          {clamp(t, -1e9, 1e9).toFixed(0)}
        </text>
      ))}

      <text x={width / 2} y={height - 10} textAnchor="middle" fontSize="12" fontFamily="var(--font-mono)" fill="#2F2F36">
        {`Drug Concentration${unitLabel}`}
      </text>
      <text
        x={14}
        y={height / 2}
        textAnchor="middle"
        fontSize="12"
        fontFamily="var(--font-mono)"
        fill="#2F2F36"
        transform={`rotate(-90 14 ${height / 2})`}
      >
        % Viability
      </text>
    </svg>
  )
}
