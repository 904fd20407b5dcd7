/**
 * mutter 46.2 (Ubuntu 24.04 LTS) 的补丁计划
 *
 * 移除 Wayland 剪贴板的焦点检查，并让 selection owner 变化通知到所有客户端：
 *   - src/wayland/meta-wayland-data-device.c          (CLIPBOARD)
 *   - src/wayland/meta-wayland-data-device-primary.c  (PRIMARY selection)
 *
 * 锚点逐字节对应上游 46.2 的源码。上游任何改动都会让锚点失效，此时应新增一个版本条目，
 * 不要修改这里。
 */

import type { PatchPlan } from "../types";

const VERSION = "46.2";
const MARKER = "VMWARE_CLIPBOARD_PATCH";
const UPSTREAM = `https://gitlab.gnome.org/GNOME/mutter/-/blob/${VERSION}`;

const block = (...lines: string[]): string => lines.join("\n");

const DATA_DEVICE = "src/wayland/meta-wayland-data-device.c";
const DATA_DEVICE_PRIMARY = "src/wayland/meta-wayland-data-device-primary.c";

// data_device_set_selection()，46.2 第 1064-1070 行
const clipboardSetSelectionAnchor = block(
  "    }",
  "",
  "  if (wl_resource_get_client (resource) !=",
  "      meta_wayland_seat_get_input_focus_client (seat))",
  "    {",
  "      if (source)",
  "        meta_wayland_data_source_cancel (source);",
  "      return;",
  "    }",
  "",
  "  /* FIXME: Store serial"
);

const clipboardSetSelectionReplacement = block(
  "    }",
  "",
  `  /* === ${MARKER} ===`,
  "   * REMOVED: Focus check that blocked clipboard writes from unfocused apps.",
  "   * X11 never had this restriction. VMware, VirtualBox and clipboard managers",
  "   * all depend on background clipboard access.",
  "   * Original code (lines 1064-1070):",
  "   *   if (wl_resource_get_client (resource) !=",
  "   *       meta_wayland_seat_get_input_focus_client (seat))",
  "   *     { if (source) meta_wayland_data_source_cancel (source); return; }",
  `   * === /${MARKER} === */`,
  "",
  "  /* FIXME: Store serial"
);

// owner_changed_cb()，46.2 第 1107-1127 行
const clipboardOwnerChangedAnchor = block(
  "  MetaWaylandSeat *seat = compositor->seat;",
  "  struct wl_resource *data_device_resource;",
  "  struct wl_client *focus_client;",
  "",
  "  focus_client = meta_wayland_seat_get_input_focus_client (seat);",
  "  if (!focus_client)",
  "    return;",
  "",
  "  if (selection_type == META_SELECTION_CLIPBOARD)",
  "    {",
  "      wl_resource_for_each (data_device_resource,",
  "                            &data_device->focus_resource_list)",
  "        {",
  "          struct wl_resource *offer = NULL;",
  "",
  "          if (new_owner)",
  "            {",
  "              offer = create_and_send_clipboard_offer (data_device,",
  "                                                       data_device_resource);",
  "            }",
  "",
  "          wl_data_device_send_selection (data_device_resource, offer);",
  "        }",
  "    }",
  "}"
);

const clipboardOfferLoop = (list: string) =>
  block(
    "      wl_resource_for_each (data_device_resource,",
    `                            &data_device->${list})`,
    "        {",
    "          struct wl_resource *offer = NULL;",
    "",
    "          if (new_owner)",
    "            {",
    "              offer = create_and_send_clipboard_offer (data_device,",
    "                                                       data_device_resource);",
    "            }",
    "",
    "          wl_data_device_send_selection (data_device_resource, offer);",
    "        }"
  );

const clipboardOwnerChangedReplacement = block(
  "  MetaWaylandSeat *seat = compositor->seat;",
  "  struct wl_resource *data_device_resource;",
  "",
  `  /* === ${MARKER} ===`,
  "   * REMOVED: Focus check that blocked clipboard notifications to unfocused apps.",
  "   * CHANGED: Now notify ALL clients, not just the focused one.",
  "   * Resources are split between resource_list (unfocused) and focus_resource_list (focused),",
  "   * so both lists are iterated to notify everyone.",
  "   * Original code only iterated focus_resource_list.",
  `   * === /${MARKER} === */`,
  "",
  "  if (selection_type == META_SELECTION_CLIPBOARD)",
  "    {",
  "      /* Notify unfocused clients (resource_list) */",
  clipboardOfferLoop("resource_list"),
  "",
  "      /* Notify focused client (focus_resource_list) */",
  clipboardOfferLoop("focus_resource_list"),
  "    }",
  "}"
);

// primary_device_set_selection()，46.2 第 184-190 行
const primarySetSelectionAnchor = block(
  "  if (source_resource)",
  "    source = wl_resource_get_user_data (source_resource);",
  "",
  "  if (wl_resource_get_client (resource) !=",
  "      meta_wayland_seat_get_input_focus_client (seat))",
  "    {",
  "      if (source)",
  "        meta_wayland_data_source_cancel (source);",
  "      return;",
  "    }",
  "",
  "  meta_wayland_data_device_primary_set_selection"
);

const primarySetSelectionReplacement = block(
  "  if (source_resource)",
  "    source = wl_resource_get_user_data (source_resource);",
  "",
  `  /* === ${MARKER} ===`,
  "   * REMOVED: Focus check that blocked primary selection writes from unfocused apps.",
  "   * X11 never had this restriction.",
  "   * Original code (lines 184-190):",
  "   *   if (wl_resource_get_client (resource) !=",
  "   *       meta_wayland_seat_get_input_focus_client (seat))",
  "   *     { if (source) meta_wayland_data_source_cancel (source); return; }",
  `   * === /${MARKER} === */`,
  "",
  "  meta_wayland_data_device_primary_set_selection"
);

// owner_changed_cb()，46.2 第 212-233 行
const primaryOwnerChangedAnchor = block(
  "  MetaWaylandSeat *seat = compositor->seat;",
  "  struct wl_resource *data_device_resource;",
  "  struct wl_client *focus_client;",
  "",
  "  focus_client = meta_wayland_seat_get_input_focus_client (seat);",
  "  if (!focus_client)",
  "    return;",
  "",
  "  if (selection_type == META_SELECTION_PRIMARY)",
  "    {",
  "      wl_resource_for_each (data_device_resource, &data_device->focus_resource_list)",
  "        {",
  "          struct wl_resource *offer = NULL;",
  "",
  "          if (new_owner)",
  "            {",
  "              offer = create_and_send_primary_offer (data_device,",
  "                                                     data_device_resource);",
  "            }",
  "",
  "          zwp_primary_selection_device_v1_send_selection (data_device_resource,",
  "                                                          offer);",
  "        }",
  "    }",
  "}"
);

const primaryOfferLoop = (list: string) =>
  block(
    `      wl_resource_for_each (data_device_resource, &data_device->${list})`,
    "        {",
    "          struct wl_resource *offer = NULL;",
    "",
    "          if (new_owner)",
    "            {",
    "              offer = create_and_send_primary_offer (data_device,",
    "                                                     data_device_resource);",
    "            }",
    "",
    "          zwp_primary_selection_device_v1_send_selection (data_device_resource,",
    "                                                          offer);",
    "        }"
  );

const primaryOwnerChangedReplacement = block(
  "  MetaWaylandSeat *seat = compositor->seat;",
  "  struct wl_resource *data_device_resource;",
  "",
  `  /* === ${MARKER} ===`,
  "   * REMOVED: Focus check that blocked primary selection notifications.",
  "   * CHANGED: Now notify ALL clients, not just the focused one.",
  `   * === /${MARKER} === */`,
  "",
  "  if (selection_type == META_SELECTION_PRIMARY)",
  "    {",
  "      /* Notify unfocused clients (resource_list) */",
  primaryOfferLoop("resource_list"),
  "",
  "      /* Notify focused client (focus_resource_list) */",
  primaryOfferLoop("focus_resource_list"),
  "    }",
  "}"
);

export const MUTTER_46_2: PatchPlan = {
  project: "mutter",
  version: VERSION,
  marker: MARKER,
  rootMarkers: ["meson.build", "src/wayland"],
  signature: { file: "meson.build", contains: "project('mutter'" },
  distroPackages: ["mutter", "mutter-common", "libmutter-14-0"],
  targets: [
    {
      id: "data-device",
      path: DATA_DEVICE,
      version: VERSION,
      referenceUrl: `${UPSTREAM}/${DATA_DEVICE}`,
      rules: [
        {
          label: "data_device_set_selection(): remove focus check",
          anchor: clipboardSetSelectionAnchor,
          replacement: clipboardSetSelectionReplacement,
        },
        {
          label: "owner_changed_cb() (clipboard): notify all clients",
          anchor: clipboardOwnerChangedAnchor,
          replacement: clipboardOwnerChangedReplacement,
        },
      ],
    },
    {
      id: "data-device-primary",
      path: DATA_DEVICE_PRIMARY,
      version: VERSION,
      referenceUrl: `${UPSTREAM}/${DATA_DEVICE_PRIMARY}`,
      rules: [
        {
          label: "primary_device_set_selection(): remove focus check",
          anchor: primarySetSelectionAnchor,
          replacement: primarySetSelectionReplacement,
        },
        {
          label: "owner_changed_cb() (primary): notify all clients",
          anchor: primaryOwnerChangedAnchor,
          replacement: primaryOwnerChangedReplacement,
        },
      ],
    },
  ],
};
