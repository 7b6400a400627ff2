type RibbonEntry = {
  label: string
  value: string | null
}

export function DetailsRibbon({ entries, align = 'left' }: { entries: RibbonEntry[]; align?: 'left' | 'right' }) {
  const visible = entries.filter((entry): entry is { label: string; value: string } => entry.value !== null)
  if (visible.length === 0) {
    return null
  }

  return (
    <p className={`details-ribbon details-ribbon-${align}`}>
      {visible.map((entry, position) => (
        <span key={entry.label}>
          {position > 0 && <span className="ribbon-separator">•</span>}
          {entry.label}: {entry.value}
        </span>
      ))}
    </p>
  )
}
