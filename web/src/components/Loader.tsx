export function Loader({ label = 'Loading…', compact = false }: { label?: string; compact?: boolean }) {
  return (
    <div className={compact ? 'loader-wrap loader-compact' : 'loader-wrap'} role="status" aria-live="polite">
      <div className="loader-orbit" />
      <p>{label}</p>
    </div>
  )
}
