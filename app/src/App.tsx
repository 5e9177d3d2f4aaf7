import { useMemo, useRef, useState } from "react";
import {
  fingerprint,
  formatReport,
  parsePreset,
  reportHash,
  runChain,
  runSweep,
  TransmissionState
} from "@core";
import type { IdeologyNode, NodeId, Preset, RunParams, SweepOutput, SweepRun } from "@core";
import baselineSpec from "../../specs/baseline.json";
import polarizingSpec from "../../specs/polarizing.json";
import longChainSpec from "../../specs/long-chain.json";
import { edgeKey, edgeLabels, ideologyColor, layoutChain, layoutHeight, legendStops } from "./chainView";

const presets: Preset[] = [baselineSpec, polarizingSpec, longChainSpec].map((spec) => parsePreset(spec));
const defaultPreset = presets[0];

type SingleParams = {
  seed: number;
  nodeCount: number;
  sensitivity: number;
  biasMin: number;
  biasMax: number;
};

type SliderKey = Exclude<keyof SingleParams, "seed">;

type SliderSpec = {
  key: SliderKey;
  label: string;
  min: number;
  max: number;
  step: number;
};

const seedBounds = { min: 0, max: 9999 };

const sliders: SliderSpec[] = [
  { key: "nodeCount", label: "Nodes", min: 2, max: 60, step: 1 },
  { key: "sensitivity", label: "Sensitivity", min: 0.05, max: 5, step: 0.05 },
  { key: "biasMin", label: "Bias min", min: 0.05, max: 6, step: 0.05 },
  { key: "biasMax", label: "Bias max", min: 0.05, max: 6, step: 0.05 }
];

const CANVAS_WIDTH = 1000;
const PER_ROW = 10;
const LEGEND_STOPS = legendStops(11);

function paramsFromPreset(preset: Preset): SingleParams {
  const { sweep } = preset;
  return {
    seed: sweep.seed,
    nodeCount: sweep.nodeCounts[sweep.nodeCounts.length - 1],
    sensitivity: sweep.sensitivities[0],
    biasMin: sweep.biasRange.min,
    biasMax: sweep.biasRange.max
  };
}

function toRunParams(params: SingleParams): RunParams {
  return {
    runId: 0,
    seed: params.seed,
    nodeCount: params.nodeCount,
    sensitivity: params.sensitivity,
    biasRange: { min: params.biasMin, max: Math.max(params.biasMin, params.biasMax) }
  };
}

function clampParam(key: keyof SingleParams, value: number): number {
  const bounds = key === "seed" ? { ...seedBounds, step: 1 } : sliders.find((slider) => slider.key === key);
  if (!bounds) return value;
  const clamped = Math.min(bounds.max, Math.max(bounds.min, value));
  return bounds.step >= 1 ? Math.round(clamped) : clamped;
}

function download(filename: string, content: string, type: string): void {
  const blob = new Blob([content], { type });
  const url = URL.createObjectURL(blob);
  const anchor = document.createElement("a");
  anchor.href = url;
  anchor.download = filename;
  anchor.click();
  URL.revokeObjectURL(url);
}

function App() {
  const [activePreset, setActivePreset] = useState<Preset>(defaultPreset);
  const [params, setParams] = useState<SingleParams>(() => paramsFromPreset(defaultPreset));
  const [seedInput, setSeedInput] = useState<string>(String(defaultPreset.sweep.seed));
  const [run, setRun] = useState<SweepRun>(() => runChain(toRunParams(paramsFromPreset(defaultPreset))));
  const [sweep, setSweep] = useState<SweepOutput>(() => runSweep(defaultPreset.sweep));
  const svgRef = useRef<SVGSVGElement | null>(null);

  const { propagation } = run;
  const layout = useMemo(() => layoutChain(propagation.path, { width: CANVAS_WIDTH, perRow: PER_ROW }), [propagation.path]);
  const labels = useMemo(() => edgeLabels(propagation.carried), [propagation.carried]);
  const nodeById = useMemo(() => new Map(run.nodes.map((node): [NodeId, IdeologyNode] => [node.id, node])), [run.nodes]);
  const canvasHeight = layoutHeight(propagation.path.length, PER_ROW);
  const report = useMemo(() => formatReport(sweep), [sweep]);
  const saturatedRuns = sweep.runs.filter((entry) => entry.propagation.state === TransmissionState.Saturated).length;

  const updateParam = (key: keyof SingleParams, nextValue: number) => {
    setParams((prev) => ({ ...prev, [key]: clampParam(key, nextValue) }));
  };

  const applyPreset = (preset: Preset) => {
    const next = paramsFromPreset(preset);
    setActivePreset(preset);
    setParams(next);
    setSeedInput(String(next.seed));
    setRun(runChain(toRunParams(next)));
    setSweep(runSweep(preset.sweep));
  };

  const runSimulation = () => {
    setRun(runChain(toRunParams(params)));
    setSweep(runSweep({ ...activePreset.sweep, seed: params.seed }));
  };

  const commitSeedInput = () => {
    const parsed = Number.parseInt(seedInput.trim(), 10);
    if (Number.isNaN(parsed)) {
      setSeedInput(String(params.seed));
      return;
    }
    const nextSeed = clampParam("seed", parsed);
    updateParam("seed", nextSeed);
    setSeedInput(String(nextSeed));
  };

  const exportSvg = () => {
    const svg = svgRef.current;
    if (!svg) return;
    const xml = new XMLSerializer().serializeToString(svg);
    download(`chain-seed-${params.seed}.svg`, `<?xml version="1.0" encoding="UTF-8"?>\n${xml}`, "image/svg+xml");
  };

  const exportReport = () => {
    download(`sweep-${activePreset.name}-seed-${sweep.config.seed}.csv`, report, "text/csv");
  };

  return (
    <div className="shell">
      <aside className="panel left-panel">
        <h1>Ideology Drift Simulator</h1>
        <p className="muted">drift = bias · sensitivity · |node − message|²</p>

        <section>
          <h2>Presets</h2>
          <div className="preset-row">
            {presets.map((preset) => (
              <button
                key={preset.name}
                className={preset.name === activePreset.name ? "active" : ""}
                onClick={() => applyPreset(preset)}
              >
                {preset.name}
              </button>
            ))}
          </div>
          <p className="muted small">{activePreset.description}</p>
        </section>

        <section>
          <h2>Chain</h2>
          <div className="sliders">
            <label>
              <span>Seed</span>
              <div className="control-row">
                <input
                  type="text"
                  inputMode="numeric"
                  value={seedInput}
                  onChange={(event) => setSeedInput(event.target.value)}
                  onBlur={commitSeedInput}
                  onKeyDown={(event) => {
                    if (event.key === "Enter") {
                      commitSeedInput();
                    }
                  }}
                />
                <output>{params.seed}</output>
              </div>
            </label>

            {sliders.map((slider) => {
              const value = params[slider.key];
              return (
                <label key={slider.key}>
                  <span>{slider.label}</span>
                  <div className="control-row">
                    <input
                      type="range"
                      min={slider.min}
                      max={slider.max}
                      step={slider.step}
                      value={value}
                      onChange={(event) => updateParam(slider.key, Number(event.target.value))}
                    />
                    <output>{value.toFixed(slider.step >= 1 ? 0 : 2)}</output>
                  </div>
                </label>
              );
            })}
          </div>
        </section>

        <section className="button-column">
          <button onClick={runSimulation}>Run</button>
          <button onClick={exportSvg}>Export SVG</button>
          <button onClick={exportReport}>Export Report</button>
        </section>
      </aside>

      <main className="center">
        <header className="center-head">
          <h2>Message Path</h2>
          <p className="muted">
            {propagation.state === TransmissionState.Saturated
              ? `Saturated at hop ${propagation.haltedAtHop ?? "?"}`
              : "Reached target"}{" "}
            · run {fingerprint(propagation)}
          </p>
        </header>

        <svg
          ref={svgRef}
          viewBox={`0 0 ${CANVAS_WIDTH} ${canvasHeight}`}
          className="graph-canvas"
          role="img"
          aria-label="Message propagation along the chain"
        >
          {propagation.path.slice(1).map((target, index) => {
            const source = propagation.path[index];
            const src = layout[String(source)];
            const dst = layout[String(target)];
            const label = labels[edgeKey(source, target)];
            return (
              <g key={edgeKey(source, target)}>
                <line
                  x1={src.x}
                  y1={src.y}
                  x2={dst.x}
                  y2={dst.y}
                  stroke={label ? ideologyColor(label.value) : "#738091"}
                  strokeWidth={label ? 3 : 1}
                  opacity={label ? 0.9 : 0.3}
                />
                {label ? (
                  <text x={(src.x + dst.x) / 2} y={(src.y + dst.y) / 2 - 8} textAnchor="middle" className="edge-label">
                    {label.text}
                  </text>
                ) : null}
              </g>
            );
          })}

          {propagation.path.map((id) => {
            const pos = layout[String(id)];
            const node = nodeById.get(id);
            const score = node?.ideologyScore ?? 0;
            return (
              <g key={String(id)} transform={`translate(${pos.x}, ${pos.y})`}>
                <circle r={16} fill={ideologyColor(score)} stroke="#11151b" strokeWidth={1} />
                <text y={-22} textAnchor="middle" className="node-label">{String(id)}</text>
                <text y={32} textAnchor="middle" className="node-score">{score.toFixed(2)}</text>
              </g>
            );
          })}
        </svg>

        <div className="legend">
          <span>0</span>
          <svg viewBox="0 0 200 12" className="legend-bar" role="img" aria-label="Ideology score colour scale">
            <defs>
              <linearGradient id="ideology-scale">
                {LEGEND_STOPS.map((stop) => (
                  <stop key={stop.offset} offset={stop.offset} stopColor={stop.color} />
                ))}
              </linearGradient>
            </defs>
            <rect width={200} height={12} fill="url(#ideology-scale)" />
          </svg>
          <span>1</span>
          <span className="muted small">Ideology score</span>
        </div>

        <table className="hop-table">
          <thead>
            <tr>
              <th>Hop</th>
              <th>Node</th>
              <th>Node ideology</th>
              <th>Bias</th>
              <th>Before</th>
              <th>After</th>
              <th>Fidelity</th>
              <th>Plausibility</th>
              <th>OK</th>
            </tr>
          </thead>
          <tbody>
            {propagation.results.map((result) => (
              <tr key={result.hop} className={result.transmissionSuccess ? undefined : "saturated"}>
                <td>{result.hop}</td>
                <td>{String(result.nodeId)}</td>
                <td>{result.nodeIdeology.toFixed(3)}</td>
                <td>{result.biasMultiplier.toFixed(2)}</td>
                <td>{result.messageIdeologyBefore.toFixed(3)}</td>
                <td>{result.messageIdeologyAfter.toFixed(3)}</td>
                <td>{result.fidelityDrift.toFixed(3)}</td>
                <td>{result.plausibilityDrift.toFixed(3)}</td>
                <td>{result.transmissionSuccess ? "yes" : "no"}</td>
              </tr>
            ))}
          </tbody>
        </table>
      </main>

      <aside className="panel right-panel">
        <section>
          <h2>Sweep</h2>
          <div className="stats">
            <div><span>Runs</span><strong>{sweep.runs.length}</strong></div>
            <div><span>Saturated</span><strong>{saturatedRuns}</strong></div>
            <div><span>Skipped</span><strong>{sweep.failures.length}</strong></div>
            <div><span>Report hash</span><strong>{reportHash(report)}</strong></div>
          </div>
          {sweep.failures.map((failure) => (
            <p key={failure.runId} className="muted small">
              run {failure.runId}: {failure.message}
            </p>
          ))}
        </section>

        <section>
          <h2>Report</h2>
          <pre className="report">{report}</pre>
        </section>
      </aside>
    </div>
  );
}

export default App;
