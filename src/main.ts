import "./styles.css";
import { DEFAULT_VIEWER_SETTINGS, clampSpawnInterval } from "./config";
import { errorMessage } from "./debug";
import { EndpointClassification, classifyEndpoints } from "./network/endpoints";
import { parseVehicleTypes } from "./network/scenarioFiles";
import { Topology, computeJunctionBounds } from "./network/types";
import { Renderer, VehicleImageCache, createFrameScheduler } from "./render/renderer";
import { Selection, pickAt } from "./selection";
import { BridgeConnection, fetchScenarioFile } from "./sim/bridgeConnection";
import type { SimulatorConnection } from "./sim/connection";
import { SignalStore } from "./sim/signalStore";
import { LoopState, SimulationLoop } from "./sim/simulationLoop";
import { VehicleStore } from "./sim/vehicleStore";
import {
  DETAILS_PLACEHOLDER,
  describeVehicle,
  formatSignalDetails,
  formatStats
} from "./ui/details";
import {
  ScenarioSelection,
  buildLaunchRequest,
  loadConfiguration,
  loadNetwork,
  reloadScenario
} from "./ui/scenarioLoader";
import { Viewport } from "./viewport";

function requireElement<T extends HTMLElement>(id: string, type: new () => T): T {
  const element = document.getElementById(id);
  if (!(element instanceof type)) {
    throw new Error(`Missing #${id} in the page.`);
  }
  return element;
}

function init() {
  const settings = DEFAULT_VIEWER_SETTINGS;
  const canvas = requireElement("mapCanvas", HTMLCanvasElement);
  const canvasHost = requireElement("canvasHost", HTMLDivElement);
  const netInput = requireElement("netFileInput", HTMLInputElement);
  const routeInput = requireElement("routeFileInput", HTMLInputElement);
  const configInput = requireElement("configFileInput", HTMLInputElement);
  const btnStart = requireElement("btnStart", HTMLButtonElement);
  const btnStop = requireElement("btnStop", HTMLButtonElement);
  const btnStep = requireElement("btnStep", HTMLButtonElement);
  const btnZoomIn = requireElement("btnZoomIn", HTMLButtonElement);
  const btnZoomOut = requireElement("btnZoomOut", HTMLButtonElement);
  const btnFit = requireElement("btnFit", HTMLButtonElement);
  const toggleDetails = requireElement("toggleDetails", HTMLInputElement);
  const spawnInterval = requireElement("spawnInterval", HTMLInputElement);
  const spawnIntervalValue = requireElement("spawnIntervalValue", HTMLSpanElement);
  const autoSpawn = requireElement("autoSpawn", HTMLInputElement);
  const statusLabel = requireElement("statusLabel", HTMLDivElement);
  const timerLabel = requireElement("timerLabel", HTMLDivElement);
  const statsLabel = requireElement("statsLabel", HTMLPreElement);
  const detailsLabel = requireElement("detailsLabel", HTMLPreElement);
  const signalControls = requireElement("signalControls", HTMLFieldSetElement);
  const signalStateInput = requireElement("signalStateInput", HTMLInputElement);
  const signalPhaseInput = requireElement("signalPhaseInput", HTMLInputElement);
  const signalProgramInput = requireElement("signalProgramInput", HTMLInputElement);
  const btnSetState = requireElement("btnSetSignalState", HTMLButtonElement);
  const btnSetPhase = requireElement("btnSetSignalPhase", HTMLButtonElement);
  const btnSetProgram = requireElement("btnSetSignalProgram", HTMLButtonElement);

  const ctx = canvas.getContext("2d");
  if (!ctx) {
    throw new Error("Canvas 2D context unavailable.");
  }

  const viewport = new Viewport({ canvasWidth: canvas.width, canvasHeight: canvas.height });
  const vehicles = new VehicleStore();
  const signals = new SignalStore();
  const renderer = new Renderer(ctx, viewport, new VehicleImageCache(settings.vehicleImages, () => new Image()));

  let topology: Topology | null = null;
  let endpoints: EndpointClassification | null = null;
  let selection: Selection | null = null;
  let scenario: ScenarioSelection = { configFile: null, netFile: null, routeFiles: [] };

  const setStatus = (message: string) => {
    statusLabel.textContent = `Status: ${message}`;
  };

  const redraw = createFrameScheduler(() => {
    renderer.render({
      topology,
      vehicles: vehicles.values(),
      signals: signals.values(),
      selection,
      showDetails: toggleDetails.checked
    });
  });

  const loop = new SimulationLoop({
    connect: () => BridgeConnection.launch(buildLaunchRequest(scenario)),
    getTopology: () => topology,
    vehicles,
    signals,
    tickIntervalMs: settings.tickIntervalMs,
    onFrame: (frame) => {
      timerLabel.textContent = `Time: ${frame.elapsed} (sim ${frame.simTime.toFixed(1)} s)`;
      statsLabel.textContent = formatStats(frame.stats, endpoints);
      if (selection?.kind === "signal") {
        refreshSelectionDetails();
      }
      redraw();
    },
    onStatus: setStatus,
    onStateChange: (state) => updateControls(state)
  });

  const updateControls = (state: LoopState = loop.getState()) => {
    const hasScenario = topology !== null;
    btnStart.disabled = !hasScenario || state === "running";
    btnStep.disabled = !hasScenario || state === "running";
    btnStop.disabled = state !== "running" && !loop.isConnected();
    signalControls.disabled = selection?.kind !== "signal" || !loop.isConnected();
  };

  const refreshSelectionDetails = () => {
    if (!selection) {
      detailsLabel.textContent = DETAILS_PLACEHOLDER;
      return;
    }
    if (selection.kind === "signal") {
      const signal = signals.get(selection.id);
      detailsLabel.textContent = signal ? formatSignalDetails(signal) : DETAILS_PLACEHOLDER;
      return;
    }
    const vehicle = vehicles.get(selection.id);
    const connection = loop.getConnection();
    if (!vehicle || !connection) {
      detailsLabel.textContent = DETAILS_PLACEHOLDER;
      return;
    }
    const requested = selection;
    void describeVehicle(connection, vehicle, Date.now()).then((text) => {
      if (selection === requested) {
        detailsLabel.textContent = text;
      }
    });
  };

  const refreshStats = () => {
    statsLabel.textContent = formatStats(loop.getStats(), endpoints);
  };

  const resizeCanvas = () => {
    const rect = canvasHost.getBoundingClientRect();
    canvas.width = Math.max(1, Math.floor(rect.width));
    canvas.height = Math.max(1, Math.floor(rect.height));
    viewport.setCanvasDimensions(canvas.width, canvas.height);
    redraw();
  };
  new ResizeObserver(resizeCanvas).observe(canvasHost);

  const applyTopology = (next: Topology, label: string) => {
    topology = next;
    endpoints = classifyEndpoints(next);
    selection = null;
    viewport.fitToBounds(computeJunctionBounds(next.junctions));
    setStatus(
      `Map loaded from ${label}. Junctions: ${next.junctions.length}, Edges: ${next.segments.length}`
    );
    refreshSelectionDetails();
    refreshStats();
    updateControls();
    redraw();
  };

  const stopLoop = () => loop.stop();

  const readFirstFile = (input: HTMLInputElement): File | null => input.files?.item(0) ?? null;

  netInput.addEventListener("change", async () => {
    const file = readFirstFile(netInput);
    if (!file) {
      return;
    }
    setStatus(`Loading map from ${file.name}...`);
    try {
      const bytes = new Uint8Array(await file.arrayBuffer());
      const next = await reloadScenario(() => loadNetwork(file.name, bytes, scenario.routeFiles), stopLoop);
      scenario = next.selection;
      applyTopology(next.topology, next.label);
    } catch (error) {
      console.error("[viewer] Failed to load network", error);
      setStatus(`ERROR: Failed to load map - ${errorMessage(error)}`);
    }
  });

  routeInput.addEventListener("change", async () => {
    const files = Array.from(routeInput.files ?? []);
    if (!files.length) {
      return;
    }
    try {
      const typeCounts: number[] = [];
      for (const file of files) {
        typeCounts.push(parseVehicleTypes(await file.text()).length);
      }
      scenario.routeFiles = files.map((file) => file.name);
      const types = typeCounts.reduce((sum, count) => sum + count, 0);
      setStatus(`Routes loaded: ${scenario.routeFiles.join(", ")} (${types} vehicle type(s))`);
    } catch (error) {
      console.error("[viewer] Failed to load routes", error);
      setStatus(`ERROR: Failed to load routes - ${errorMessage(error)}`);
    }
  });

  configInput.addEventListener("change", async () => {
    const file = readFirstFile(configInput);
    if (!file) {
      return;
    }
    setStatus(`Loading configuration ${file.name}...`);
    try {
      const text = await file.text();
      const next = await reloadScenario(
        () => loadConfiguration(file.name, text, (name) => fetchScenarioFile(name)),
        stopLoop
      );
      scenario = next.selection;
      applyTopology(next.topology, next.label);
    } catch (error) {
      console.error("[viewer] Failed to load configuration", error);
      setStatus(`ERROR: Failed to load configuration - ${errorMessage(error)}`);
    }
  });

  btnStart.addEventListener("click", async () => {
    await loop.start();
    updateControls();
  });

  btnStop.addEventListener("click", async () => {
    await loop.stop();
    selection = null;
    refreshSelectionDetails();
    updateControls();
    redraw();
  });

  btnStep.addEventListener("click", async () => {
    if (await loop.step()) {
      setStatus(`Stepped to ${loop.getSimulationTime().toFixed(1)} s`);
    }
    updateControls();
  });

  btnZoomIn.addEventListener("click", () => {
    viewport.zoomBy(settings.zoomInFactor);
    redraw();
  });

  btnZoomOut.addEventListener("click", () => {
    viewport.zoomBy(1 / settings.zoomInFactor);
    redraw();
  });

  btnFit.addEventListener("click", () => {
    if (topology) {
      viewport.fitToBounds(computeJunctionBounds(topology.junctions));
      redraw();
    }
  });

  toggleDetails.addEventListener("change", () => redraw());

  let drag: { x: number; y: number; moved: boolean } | null = null;
  canvas.addEventListener("mousedown", (event) => {
    drag = { x: event.clientX, y: event.clientY, moved: false };
  });
  window.addEventListener("mousemove", (event) => {
    if (!drag) {
      return;
    }
    const dx = event.clientX - drag.x;
    const dy = event.clientY - drag.y;
    if (dx || dy) {
      drag.moved = true;
      viewport.pan(dx, dy);
      drag.x = event.clientX;
      drag.y = event.clientY;
      redraw();
    }
  });
  window.addEventListener("mouseup", () => {
    drag = null;
  });

  canvas.addEventListener(
    "wheel",
    (event) => {
      event.preventDefault();
      viewport.zoomBy(event.deltaY < 0 ? settings.wheelZoomInFactor : settings.wheelZoomOutFactor);
      redraw();
    },
    { passive: false }
  );

  canvas.addEventListener("click", (event) => {
    if (!topology) {
      return;
    }
    const rect = canvas.getBoundingClientRect();
    const world = viewport.screenToWorld({ x: event.clientX - rect.left, y: event.clientY - rect.top });
    selection = pickAt(world.x, world.y, viewport.getZoom(), signals, vehicles, settings);
    if (selection?.kind === "signal") {
      const signal = signals.get(selection.id);
      signalStateInput.value = signal?.state ?? "";
      signalPhaseInput.value = String(signal?.phase ?? 0);
      signalProgramInput.value = signal?.program ?? "";
    }
    refreshSelectionDetails();
    updateControls();
    redraw();
  });

  const controlSignal = async (
    label: string,
    apply: (connection: SimulatorConnection, id: string) => Promise<void>
  ) => {
    const connection = loop.getConnection();
    if (selection?.kind !== "signal" || !connection) {
      return;
    }
    const id = selection.id;
    try {
      await apply(connection, id);
      setStatus(`${label} applied to ${id}`);
    } catch (error) {
      console.error(`[viewer] ${label} failed for ${id}`, error);
      setStatus(`ERROR: ${label} failed - ${errorMessage(error)}`);
    }
  };

  btnSetState.addEventListener("click", () => {
    const state = signalStateInput.value.trim();
    void controlSignal("Signal state", (connection, id) => connection.setSignalState(id, state));
  });

  btnSetPhase.addEventListener("click", () => {
    const phase = Number.parseInt(signalPhaseInput.value, 10);
    if (!Number.isInteger(phase) || phase < 0) {
      setStatus("Phase must be a non-negative integer.");
      return;
    }
    void controlSignal("Signal phase", (connection, id) => connection.setSignalPhase(id, phase));
  });

  btnSetProgram.addEventListener("click", () => {
    const program = signalProgramInput.value.trim();
    if (!program) {
      setStatus("Program id is required.");
      return;
    }
    void controlSignal("Signal program", (connection, id) => connection.setSignalProgram(id, program));
  });

  spawnInterval.min = String(settings.spawnIntervalMin);
  spawnInterval.max = String(settings.spawnIntervalMax);
  spawnInterval.value = String(settings.spawnIntervalDefault);
  spawnIntervalValue.textContent = `${settings.spawnIntervalDefault} s`;
  spawnInterval.addEventListener("input", () => {
    const value = clampSpawnInterval(Number(spawnInterval.value), settings);
    spawnIntervalValue.textContent = `${value} s`;
  });
  autoSpawn.addEventListener("change", () => {
    const value = clampSpawnInterval(Number(spawnInterval.value), settings);
    setStatus(autoSpawn.checked ? `Auto-spawn enabled (every ${value} s)` : "Auto-spawn disabled");
  });

  detailsLabel.textContent = DETAILS_PLACEHOLDER;
  timerLabel.textContent = "Time: 00:00:00";
  setStatus("Load a network file to begin.");
  refreshStats();
  updateControls();
  resizeCanvas();
}

init();
