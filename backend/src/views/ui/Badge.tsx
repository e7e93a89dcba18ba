import type { VariableSource } from "../../../../packages/shared/src/types";
import { cx } from "./cx";

const sourceClasses: Record<VariableSource, string> = {
  fetched: "badge-fetched",
  manual: "badge-manual"
};

export interface BadgeProps {
  source: VariableSource;
  className?: string;
}

export function Badge({ source, className }: BadgeProps) {
  return <span className={cx("badge", sourceClasses[source], className)}>{source}</span>;
}
