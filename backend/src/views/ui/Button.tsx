import { type ButtonHTMLAttributes } from "react";
import { cx } from "./cx";

type Variant = "primary" | "secondary";

export interface ButtonProps extends ButtonHTMLAttributes<HTMLButtonElement> {
  variant?: Variant;
}

export function Button({ className, variant = "primary", type = "submit", ...props }: ButtonProps) {
  return <button type={type} className={cx(variant === "secondary" && "secondary", className)} {...props} />;
}
