import type { Notice } from "../../../../packages/shared/src/types";

export interface BannerProps {
  notice: Notice;
}

/** One notice; error kinds are shown as a prefix. */
export function Banner({ notice }: BannerProps) {
  const prefix = notice.kind ? `${notice.kind}: ` : "";
  return (
    <div role="alert" className={`banner banner-${notice.level}`}>
      {`${prefix}${notice.message}`}
    </div>
  );
}
